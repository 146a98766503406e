#!/usr/bin/env tsx
/**
 * CLI Entry Point
 * 
 * Command-line tools for a clipset dataset. Works on the files directly;
 * no server needed.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '@clipset/utils';

// Commands
import { repairCommand } from './commands/repair.js';
import { focusCommand } from './commands/focus.js';
import { probeCommand } from './commands/probe.js';

const program = new Command();

program
  .name('clipset')
  .description('Dataset maintenance for label-bucketed training clips')
  .version('1.0.0')
  .option('--debug', 'Enable debug output')
  .hook('preAction', (command) => {
    // Per-file progress is printed by the commands; keep the logger quiet
    logger.level = command.opts<{ debug?: boolean }>().debug ? 'debug' : process.env['LOG_LEVEL'] ?? 'warn';
  });

// ============================================
// DATASET COMMANDS
// ============================================

program
  .command('repair [root]')
  .description('Normalize every clip under a Training directory (one folder per label)')
  .option('--exts <list>', 'Comma-separated list of extensions to include', '.m4v,.mov,.mp4')
  .option('--cfr <fps>', 'Force a constant frame rate; 0 keeps the source timing', '30')
  .option('--audio <policy>', 'Audio policy: aac or drop')
  .option('--hw-encoder <name>', 'Hardware encoder to fall back to')
  .option('--dry-run', 'Only print actions; do not modify files', false)
  .option('--backup-ext <ext>', 'Backup suffix for originals (empty string deletes originals)', '.bak')
  .action(repairCommand);

program
  .command('focus [root]')
  .description('List labels below a clip-count threshold')
  .option('--threshold <count>', 'Desired clips per label', '50')
  .option('--margin <count>', 'Tolerance around the threshold', '0')
  .option('--top <count>', 'Only show the first N labels (0 = all)', '0')
  .option('--ext <ext>', 'Extra file extension to include (repeatable)', (value: string, previous: string[]) => [...previous, value], [])
  .action(focusCommand);

// ============================================
// MEDIA COMMANDS
// ============================================

program
  .command('probe <file>')
  .description('Show stream info and the repair action for one file')
  .option('--json', 'Output in JSON format')
  .action(probeCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('clipset --help'), 'for available commands');
  }
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  process.exit(2);
});

// Parse and execute
program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red('✗'), err instanceof Error ? err.message : String(err));
  process.exit(1);
});
