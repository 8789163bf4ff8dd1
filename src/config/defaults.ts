import { DEFAULT_INTERVAL_SEC } from '../domain/entities/CaptureEvent.js';
import type { CaptureDistillConfig } from './types.js';

export const DEFAULT_CONFIG: CaptureDistillConfig = {
  version: 1,
  pipeline: {
    defaultIntervalSec: DEFAULT_INTERVAL_SEC,
    stage: 'hour_packed',
  },
  hourPack: {
    maxClusters: 3,
    maxCommonTexts: 20,
    commonTextPrefixChars: 240,
  },
  summary: {
    minActiveSec: 120,
    maxHours: 24,
  },
  trace: {
    enabled: false,
    dir: '.capdistill/trace',
    stageMax: null,
  },
  log: {
    level: 'info',
  },
};
