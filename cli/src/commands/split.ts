import chalk from 'chalk';
import { basename, relative } from 'node:path';
import { Command } from 'commander';
import {
  DEFAULT_OUTPUT_DIR,
  DEFAULT_THRESHOLD,
  FULL_CATALOG,
  detectSections,
  describeRange,
  loadLayout,
  previewLine,
  splitPdf,
} from '../core/pdf/index.js';
import type { BoundaryMatch, SplitResult } from '../core/pdf/index.js';
import { cliAction } from './action.js';
import { createCliLogger } from './logger.js';
import { parseList, parseRatio } from './parsers.js';

interface SplitCommandOpts {
  threshold?: number;
  layout?: string;
  dryRun?: boolean;
  verbose?: boolean;
  json?: boolean;
}

interface DetectCommandOpts {
  threshold?: number;
  titles?: string[];
  json?: boolean;
}

export function registerSplitCommand(program: Command): void {
  // ── pdf-sections split ────────────────────────────────────────
  program
    .command('split')
    .description(
      'Split a proposal PDF into one file per section.\n' +
      'Page 1 is the summary, pages 2-16 the description; the remaining sections are\n' +
      'located by fuzzy-matching their titles. Use --layout to describe another template.',
    )
    .argument('<file>', 'Input PDF')
    .argument('[outputDir]', `Output directory (default: ${DEFAULT_OUTPUT_DIR})`)
    .option('-t, --threshold <ratio>', `Similarity threshold 0-1 (default ${DEFAULT_THRESHOLD})`, parseRatio)
    .option('--layout <path>', 'JSON layout: { fixed: [{ name, startPage, pages }], detected: [titles], scanFrom? }')
    .option('--dry-run', 'Detect and resolve ranges only, write nothing')
    .option('-v, --verbose', 'Show per-section detection details')
    .option('--json', 'Output as JSON')
    .action(cliAction(async (file: string, outputDir: string | undefined, opts: SplitCommandOpts) => {
      const layout = opts.layout ? loadLayout(opts.layout) : undefined;
      const logger = createCliLogger({ quiet: opts.json, verbose: opts.verbose });

      if (!opts.json) {
        console.log(chalk.bold(`Splitting ${basename(file)}...`));
      }

      const result = await splitPdf(file, outputDir ?? DEFAULT_OUTPUT_DIR, {
        threshold: opts.threshold,
        layout,
        dryRun: opts.dryRun,
        logger,
      });

      if (opts.json) {
        console.log(JSON.stringify(toJson(result), null, 2));
        return;
      }
      printSplitResult(result);
    }, (_file, _outputDir, opts) => opts.json === true));

  // ── pdf-sections detect ───────────────────────────────────────
  program
    .command('detect')
    .description('Report the page each catalog title first appears on, scanning from page 1. Writes nothing')
    .argument('<file>', 'Input PDF')
    .option('-t, --threshold <ratio>', `Similarity threshold 0-1 (default ${DEFAULT_THRESHOLD})`, parseRatio)
    .option('--titles <list>', 'Comma-separated catalog (default: all proposal sections)', parseList)
    .option('--json', 'Output as JSON')
    .action(cliAction(async (file: string, opts: DetectCommandOpts) => {
      const result = await detectSections(file, {
        threshold: opts.threshold,
        titles: opts.titles ?? FULL_CATALOG,
      });

      if (opts.json) {
        console.log(JSON.stringify({
          file: basename(result.file),
          pageCount: result.pageCount,
          sections: result.matches.map(matchToJson),
          missing: result.missing,
        }, null, 2));
        return;
      }

      console.log(chalk.bold('Section Detection'));
      console.log(`  File: ${basename(result.file)} (${result.pageCount} pages)\n`);
      if (result.matches.length === 0) {
        console.log(chalk.yellow('  No sections detected.'));
      }
      for (const m of result.matches) {
        console.log(`  ${chalk.cyan(m.title)}: page ${m.page + 1}  ${scoreColor(m.score)}  ${chalk.dim(previewLine(m.line))}`);
      }
      for (const title of result.missing) {
        console.log(`  ${chalk.dim(title)}: ${chalk.yellow('not found')}`);
      }
    }, (_file, opts) => opts.json === true));
}

// ── Output helpers ───────────────────────────────────────────────

function toJson(result: SplitResult) {
  return {
    file: basename(result.file),
    pageCount: result.pageCount,
    dryRun: result.dryRun,
    sections: result.sections.map((s) => ({
      name: s.name,
      path: s.path,
      source: s.range.source,
      start: s.range.start,
      end: s.range.end,
      pageCount: s.pageCount,
    })),
    matches: result.matches.map(matchToJson),
  };
}

function matchToJson(m: BoundaryMatch) {
  return {
    title: m.title,
    page: m.page,
    score: Math.round(m.score * 10000) / 10000,
    line: m.line.trim(),
  };
}

function printSplitResult(result: SplitResult): void {
  const verb = result.dryRun ? 'Would create' : 'Created';
  console.log('');
  console.log(chalk.bold(`${verb} ${result.sections.length} PDF${result.sections.length === 1 ? '' : 's'} from ${result.pageCount} pages:`));

  for (const s of result.sections) {
    const where = describeRange(s.range, result.pageCount);
    const tag = s.range.source === 'fixed' ? chalk.dim('fixed') : chalk.dim('detected');
    const target = relative(process.cwd(), s.path) || s.path;
    const line = `  - ${s.name}: ${target}  (${where})  ${tag}`;
    console.log(s.pageCount === 0 ? chalk.yellow(line) : line);
  }
}

function scoreColor(score: number): string {
  const label = score.toFixed(2);
  return score >= 0.9 ? chalk.green(label) : chalk.yellow(label);
}
