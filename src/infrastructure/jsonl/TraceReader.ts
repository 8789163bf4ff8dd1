import fs from 'node:fs/promises';
import path from 'node:path';
import type { StageRecordMap } from '../../domain/ports/TracePort.js';
import { TraceRecordError } from '../../domain/errors/DomainErrors.js';
import { STAGE_FILES, STAGE_SCHEMAS } from './schemas.js';

/**
 * 讀回 JsonlTraceWriter 寫出的 stage 紀錄，逐行以 schema 驗證。
 * 檔案不存在時回傳空陣列；任一行不合法即丟出 TraceRecordError。
 */
export async function readStageRecords<S extends keyof StageRecordMap>(
  runDir: string,
  stage: S,
): Promise<StageRecordMap[S][]> {
  const filePath = path.join(runDir, STAGE_FILES[stage]);
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }

  const schema = STAGE_SCHEMAS[stage];
  const records: StageRecordMap[S][] = [];
  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      throw new TraceRecordError(filePath, i + 1, 'invalid JSON', { cause: err });
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new TraceRecordError(filePath, i + 1, parsed.error.issues[0].message);
    }
    records.push(parsed.data);
  }
  return records;
}
