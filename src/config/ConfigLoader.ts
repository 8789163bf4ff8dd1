import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_CONFIG } from './defaults.js';
import type { CaptureDistillConfig, PartialConfig } from './types.js';
import { InvalidConfigError } from '../domain/errors/DomainErrors.js';
import { isPipelineStage } from '../application/dto/PipelineOutput.js';
import { isLogLevel } from '../shared/Logger.js';

export type { CaptureDistillConfig, PartialConfig } from './types.js';

export const CONFIG_FILE_NAME = '.capdistill.json';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 深層合併：partial 覆蓋 base，undefined 不覆蓋 */
function deepMerge<T extends object>(base: T, partial: unknown): T {
  if (!isPlainObject(partial)) return base;
  const result: Partial<Record<string, unknown>> = { ...base };
  for (const [key, val] of Object.entries(partial)) {
    if (val === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMerge(current, val) : val;
  }
  // key 集合與 base 相同，型別由 validate 把關
  return result as T;
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw.trim());
  return Number.isInteger(n) ? n : undefined;
}

/** 環境變數覆蓋 config，無法解析的數值忽略 */
function applyEnvOverrides(config: CaptureDistillConfig): void {
  const level = process.env.CAPDISTILL_LOG_LEVEL?.trim();
  if (level && isLogLevel(level)) config.log.level = level;

  const stageMax = envInt('CAPDISTILL_TRACE_STAGE_MAX');
  if (stageMax !== undefined) config.trace.stageMax = stageMax;

  const minSec = envInt('CAPDISTILL_HOURLY_MIN_SEC');
  if (minSec !== undefined) config.summary.minActiveSec = Math.max(0, minSec);

  const maxHours = envInt('CAPDISTILL_HOURLY_MAX_HOURS');
  if (maxHours !== undefined) config.summary.maxHours = Math.max(0, maxHours);
}

function requireIntInRange(value: number, name: string, min: number, max: number = Infinity): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Infinity ? `>= ${min}` : `between ${min} and ${max}`;
    throw new InvalidConfigError(`${name} must be an integer ${range}`);
  }
}

/** 驗證設定值的合法性 */
function validate(config: CaptureDistillConfig): void {
  requireIntInRange(config.pipeline.defaultIntervalSec, 'pipeline.defaultIntervalSec', 1);
  if (!isPipelineStage(config.pipeline.stage)) {
    throw new InvalidConfigError(`pipeline.stage must be one of normalized, segmented, compacted, hour_packed`);
  }
  requireIntInRange(config.hourPack.maxClusters, 'hourPack.maxClusters', 1, 3);
  requireIntInRange(config.hourPack.maxCommonTexts, 'hourPack.maxCommonTexts', 1, 20);
  requireIntInRange(config.hourPack.commonTextPrefixChars, 'hourPack.commonTextPrefixChars', 1);
  requireIntInRange(config.summary.minActiveSec, 'summary.minActiveSec', 0);
  requireIntInRange(config.summary.maxHours, 'summary.maxHours', 0);
  if (config.trace.stageMax !== null) {
    requireIntInRange(config.trace.stageMax, 'trace.stageMax', 0);
  }
  if (!isLogLevel(config.log.level)) {
    throw new InvalidConfigError('log.level must be one of debug, info, warn, error');
  }
}

/**
 * 載入設定：讀取 .capdistill.json（若存在）並合併到預設值上
 * @param rootDir - 設定檔所在目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(rootDir: string, overrides?: PartialConfig): CaptureDistillConfig {
  let fileConfig: unknown = {};

  const configPath = path.join(rootDir, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, 'utf-8');
    try {
      fileConfig = JSON.parse(raw);
    } catch (err) {
      throw new InvalidConfigError(`${configPath} is not valid JSON`, { cause: err });
    }
  }

  // 合併順序：defaults < file config < overrides < env
  const base: CaptureDistillConfig = structuredClone(DEFAULT_CONFIG);
  let merged = deepMerge(base, fileConfig);
  if (overrides) {
    merged = deepMerge(merged, overrides);
  }

  applyEnvOverrides(merged);

  validate(merged);
  return merged;
}
