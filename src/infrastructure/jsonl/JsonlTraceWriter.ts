import fs from 'node:fs/promises';
import path from 'node:path';
import type { StageRecordMap, TracePort, TraceRun, TraceRunInfo } from '../../domain/ports/TracePort.js';
import { STAGE_FILES } from './schemas.js';

/** 寫入 <baseDir>/<runId>/ 的單一 run；同一 stage 重複寫入時為 append */
export class JsonlTraceRun implements TraceRun {
  constructor(
    readonly runId: string,
    readonly runDir: string,
  ) {}

  async writeStage<S extends keyof StageRecordMap>(stage: S, records: StageRecordMap[S][]): Promise<void> {
    const body = records.map((r) => JSON.stringify(r) + '\n').join('');
    await fs.appendFile(path.join(this.runDir, STAGE_FILES[stage]), body, 'utf-8');
  }
}

/**
 * 把各 stage 的輸出寫成 <baseDir>/<runId>/stage-NN.<name>.jsonl，一筆一行。
 * writer 本身不保存 run 狀態，可在多個同時進行的 run 之間共用。
 */
export class JsonlTraceWriter implements TracePort {
  constructor(private readonly baseDir: string) {}

  runDir(runId: string): string {
    return path.join(this.baseDir, runId);
  }

  async startRun(info: TraceRunInfo): Promise<JsonlTraceRun> {
    const runDir = this.runDir(info.runId);
    await fs.mkdir(runDir, { recursive: true });
    await fs.writeFile(path.join(runDir, 'run.json'), JSON.stringify(info) + '\n', 'utf-8');
    return new JsonlTraceRun(info.runId, runDir);
  }
}
