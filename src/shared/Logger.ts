export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

/** 程序層級的預設最低等級，由 config 設定 */
let defaultMinLevel: LogLevel = 'info';

export function setDefaultLogLevel(level: LogLevel): void {
  defaultMinLevel = level;
}

/** 結構化 JSON logger，一律寫到 stderr，stdout 只留給指令輸出 */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel?: LogLevel,
  ) {}

  /** 以 "parent:child" 為 context 的子 logger，沿用相同等級 */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.minLevel);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel ?? defaultMinLevel];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    process.stderr.write(JSON.stringify(entry) + '\n');
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}
