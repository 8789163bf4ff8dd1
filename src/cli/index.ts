#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerRunCommand } from './commands/run.js';
import { registerHoursCommand } from './commands/hours.js';

// 從 package.json 動態讀取版本號（編譯後位於 dist/src/cli）
const require = createRequire(import.meta.url);
const { version } = require('../../../package.json') as { version: string };

const program = new Command();

program
  .name('capdistill')
  .description('Distill screen-capture OCR logs into hour-scoped packs for summarization')
  .version(version);

registerRunCommand(program);
registerHoursCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exit(0);
      }
      process.exit(err.exitCode);
    }
    const message = err instanceof Error ? err.message : 'Unknown error';
    process.stderr.write(`Error: ${message}\n`);
    process.exit(1);
  }
}

void main();
