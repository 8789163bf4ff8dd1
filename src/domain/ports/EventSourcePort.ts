import type { CaptureEvent } from '../entities/CaptureEvent.js';

export interface EventSourceResult {
  events: CaptureEvent[];
  /** 略過的行與被排除的事件說明 */
  warnings: string[];
}

export interface EventSourcePort {
  readEvents(filePath: string): Promise<EventSourceResult>;
}
