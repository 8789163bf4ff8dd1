import type { Command } from 'commander';
import { loadConfig } from '../../config/ConfigLoader.js';
import { isPipelineStage, PIPELINE_STAGES } from '../../application/dto/PipelineOutput.js';
import { setDefaultLogLevel } from '../../shared/Logger.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { createDistillUseCase, parseFormat } from './shared.js';

/** 註冊 run 指令：執行 pipeline 到指定 stage 並輸出該 stage 結果 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Distill a capture log (JSONL) into segments and hour packs')
    .requiredOption('--input <path>', 'Capture log JSONL file')
    .option('--stage <stage>', `Last stage to run: ${PIPELINE_STAGES.join(', ')}`)
    .option('--trace', 'Write every produced stage as JSONL under trace.dir')
    .option('--root <path>', 'Directory holding .capdistill.json', '.')
    .option('--format <format>', 'Output format: json or text', 'json')
    .action(async (opts: { input: string; stage?: string; trace?: boolean; root: string; format: string }) => {
      const format = parseFormat(opts.format);
      const config = loadConfig(opts.root);
      setDefaultLogLevel(config.log.level);

      const stage = opts.stage ?? config.pipeline.stage;
      if (!isPipelineStage(stage)) {
        throw new Error(`Unknown stage "${stage}" (expected one of ${PIPELINE_STAGES.join(', ')})`);
      }

      const useCase = createDistillUseCase(opts.root, config, opts.trace ?? config.trace.enabled);
      const result = await useCase.runFromFile(opts.input, { stage });

      const { output } = result;
      const last =
        output.stage === 'normalized' ? output.events
        : output.stage === 'segmented' ? output.segments
        : output.stage === 'compacted' ? output.compacted
        : output.hourPacks;

      const formatter = new OutputFormatter();
      process.stdout.write(formatter.formatObject({ stage, warnings: result.warnings, records: last }, format) + '\n');
    });
}
