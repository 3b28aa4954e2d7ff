#!/usr/bin/env node
/**
 * pdf-sections: split proposal PDFs into per-section files.
 *
 * Usage:
 *   pdf-sections split proposal.pdf ./output
 *   pdf-sections split proposal.pdf --threshold 0.8 --dry-run
 *   pdf-sections detect proposal.pdf --json
 */
import { Command } from 'commander';
import { registerSplitCommand } from './commands/split.js';

const VERSION = '1.0.0';

const program = new Command();

program
  .name('pdf-sections')
  .description('Locate named sections in a PDF and split it into one file per section')
  .version(VERSION);

registerSplitCommand(program);

await program.parseAsync(process.argv);
