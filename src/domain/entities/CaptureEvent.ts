/** 未標示取樣間隔時的預設值（秒） */
export const DEFAULT_INTERVAL_SEC = 300;

/** 單一 display 的 OCR 觀測（上游已完成排除／遮罩） */
export interface DisplayObservation {
  display: number;
  text: string;
  /** 每個 event 至多一個 display 為 true；無法判定時全部為 false */
  isActiveDisplay: boolean;
}

/** 每次取樣產生的擷取事件（外部產生、不可變） */
export interface CaptureEvent {
  id: string;
  /** ISO 8601，含 UTC offset */
  ts: string;
  /** 取樣間隔（秒），用於估算時間而非實測 */
  intervalSec: number;
  activeApp?: string | null;
  windowTitle?: string | null;
  domain?: string | null;
  displays: DisplayObservation[];
}
