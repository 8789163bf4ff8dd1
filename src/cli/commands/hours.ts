import type { Command } from 'commander';
import { loadConfig } from '../../config/ConfigLoader.js';
import { buildSummaryInput } from '../../application/SummaryInputBuilder.js';
import { setDefaultLogLevel } from '../../shared/Logger.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { createDistillUseCase, parseFormat } from './shared.js';

/** 註冊 hours 指令：輸出交給 summarizer 的小時輸入 */
export function registerHoursCommand(program: Command): void {
  program
    .command('hours')
    .description('Print hour packs above the activity threshold, ready for summarization')
    .requiredOption('--input <path>', 'Capture log JSONL file')
    .option('--root <path>', 'Directory holding .capdistill.json', '.')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: { input: string; root: string; format: string }) => {
      const format = parseFormat(opts.format);
      const config = loadConfig(opts.root);
      setDefaultLogLevel(config.log.level);

      const useCase = createDistillUseCase(opts.root, config);
      const { output } = await useCase.runFromFile(opts.input, { stage: 'hour_packed' });
      const hourPacks = output.stage === 'hour_packed' ? output.hourPacks : [];

      const hours = buildSummaryInput(hourPacks, config.summary);
      const formatter = new OutputFormatter();
      process.stdout.write(formatter.formatSummaryHours(hours, format) + '\n');
    });
}
