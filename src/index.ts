#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { HISTORY_FILE, loadHistory } from './analysis/history.js';
import { toIsoDate } from './analysis/dates.js';
import { CONFIG_FILE, createDefaultConfigFile, resolveDataDir } from './config.js';
import { formatError, NoCommitsError } from './errors.js';
import { createConsoleLogger, createStderrLogger } from './logger.js';
import { readReportSummary, runScan, summaryLines } from './pipeline.js';
import { ENRICH_MODELS, type EnrichModel } from './types.js';

interface ScanCliOptions {
  enrich?: boolean;
  enrichModel?: string;
  dir?: string;
  format: string;
  verbose?: boolean;
}

interface StatusCliOptions {
  dir?: string;
  format: string;
}

function isEnrichModel(name: string): name is EnrichModel {
  return Object.prototype.hasOwnProperty.call(ENRICH_MODELS, name);
}

const program = new Command();

program
  .name('capability-clock')
  .description('Score commit history across repositories and forecast when capability growth converges')
  .version('0.1.0');

program
  .command('scan')
  .description('Scan repositories, fit growth models and write data.json')
  .option('--enrich', 'Classify commits with the external model (needs ANTHROPIC_API_KEY)')
  .option('--enrich-model <name>', 'Classifier model: haiku or sonnet')
  .option('--dir <path>', 'Data directory for config, caches and output')
  .option('--format <type>', 'Output format: text or json', 'text')
  .option('--verbose', 'Show detailed output')
  .action(async (opts: ScanCliOptions) => {
    const json = opts.format === 'json';
    // JSON output owns stdout
    const logger = json ? createStderrLogger(opts.verbose) : createConsoleLogger(opts.verbose);
    try {
      let model: EnrichModel | undefined;
      if (opts.enrichModel !== undefined) {
        if (!isEnrichModel(opts.enrichModel)) {
          throw new Error(`Unknown model "${opts.enrichModel}" (expected ${Object.keys(ENRICH_MODELS).join(' or ')})`);
        }
        model = opts.enrichModel;
      }

      const dataDir = resolveDataDir(opts.dir);
      const report = await runScan({ dataDir, enrich: opts.enrich, model, logger });

      if (json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      console.log('');
      for (const line of summaryLines(report, toIsoDate(new Date()))) console.log(line);
    } catch (err) {
      console.error(chalk.red(`\nScan failed:\n${formatError(err)}`));
      if (err instanceof NoCommitsError) {
        console.error(chalk.dim(`\nTip: add repositories to repos.scanDirs in ${CONFIG_FILE}, or run: capability-clock init`));
      }
      process.exit(1);
    }
  });

program
  .command('init')
  .description(`Generate a ${CONFIG_FILE} file with defaults`)
  .option('--dir <path>', 'Data directory for config, caches and output')
  .action((opts: { dir?: string }) => {
    const dataDir = resolveDataDir(opts.dir);
    const configPath = join(dataDir, CONFIG_FILE);

    if (existsSync(configPath)) {
      console.log(chalk.yellow(`Config already exists at ${configPath}`));
      console.log(chalk.dim('Delete it first if you want to regenerate defaults.'));
      return;
    }

    try {
      createDefaultConfigFile(dataDir);
    } catch (err) {
      console.error(chalk.red(`\nInit failed:\n${formatError(err)}`));
      process.exit(1);
    }
    console.log(chalk.green(`Created config at ${configPath}`));
    console.log(chalk.dim('Set repos.scanDirs or repos.broadScan.root, then run: capability-clock scan'));
  });

program
  .command('status')
  .description('Show the last scan result and convergence history')
  .option('--dir <path>', 'Data directory for config, caches and output')
  .option('--format <type>', 'Output format: text or json', 'text')
  .action((opts: StatusCliOptions) => {
    try {
      const dataDir = resolveDataDir(opts.dir);
      const summary = readReportSummary(dataDir);
      const history = loadHistory(join(dataDir, HISTORY_FILE), createConsoleLogger());

      if (opts.format === 'json') {
        console.log(JSON.stringify({ report: summary, history }, null, 2));
        return;
      }

      if (!summary) {
        console.log(chalk.dim('No scan yet. Run: capability-clock scan'));
        return;
      }

      console.log(chalk.blue(`Last scan ${summary.generated}`));
      for (const line of summaryLines(summary, toIsoDate(new Date()))) console.log(line);

      if (history.length > 1) {
        console.log(chalk.blue('\nConvergence history'));
        for (const entry of history.slice(-10)) {
          console.log(`  ${entry.scan_time}  ${chalk.white(entry.convergence_date ?? '-')}  ${entry.total_commits} commits  ${chalk.dim(entry.scoring_method)}`);
        }
      }
    } catch (err) {
      console.error(chalk.red(`\nStatus failed:\n${formatError(err)}`));
      process.exit(1);
    }
  });

program.parse();
