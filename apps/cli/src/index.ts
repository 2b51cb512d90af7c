#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for tempo-consensus.
 * Reads results documents written by the BPM detection tools and reports how
 * far the detection methods agree. No analysis logic lives here.
 */

import './env.js';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';

// Commands
import { reportCommand } from './commands/report.js';
import { methodsCommand } from './commands/methods.js';

function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a number >= 0.');
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a whole number >= 1.');
  }
  return parsed;
}

const program = new Command();

program
  .name('tempo-consensus')
  .description('Cross-method BPM agreement analysis')
  .version('1.0.0');

// ============================================
// ANALYSIS COMMANDS
// ============================================

program
  .command('report <inputs...>')
  .description('Summarize per-method statistics, high-variance files and method agreement')
  .option('-t, --tolerance <bpm>', 'Agreement tolerance in BPM (default 5)', parseNonNegative)
  .option('--threshold <bpm>', 'Spread above which a file is flagged (default 20)', parseNonNegative)
  .option('-n, --top <count>', 'High-variance files to echo to the console (default 5)', parsePositiveInt)
  .option('-o, --output <prefix>', 'Write <prefix>_summary.txt instead of printing')
  .option('-d, --out-dir <dir>', 'Directory for written files (default bpm-results)')
  .option('--json', 'Render the structured JSON report')
  .option('-e, --export', 'Also write combined and per-method JSON exports')
  .action(reportCommand);

program
  .command('methods <inputs...>')
  .description('List methods and their coverage')
  .action(methodsCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('tempo-consensus --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
await program.parseAsync();
