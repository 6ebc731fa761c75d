#!/usr/bin/env node
/**
 * beauty-dash - generate mock beauty data and print the dashboard report
 *
 * Usage:
 *   beauty-dash generate --days 30 --seed 7 --format csv --out ./data
 *   beauty-dash report --brands Radiance,GlowUp --from 2024-03-01 --to 2024-03-31
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { runGenerate, runReport } from './commands.js';
import type { CliOptions, RunContext } from './commands.js';

const program = new Command();

program
  .name('beauty-dash')
  .description('Mock data for a multi-brand beauty analytics dashboard')
  .version('0.1.0');

function withDataOptions(command: Command): Command {
  return command
    .option('-s, --start <date>', 'First day (YYYY-MM-DD); defaults to 90 days ago')
    .option('-d, --days <number>', 'Number of days to generate')
    .option('-b, --brands <brands>', 'Comma-separated brand names')
    .option('--seed <seed>', 'Seed for reproducible output')
    .option('-v, --verbose', 'Log generation progress');
}

function context(): RunContext {
  return { env: process.env, today: new Date(), log: message => console.log(message) };
}

function fail(error: unknown): never {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
}

withDataOptions(program.command('generate'))
  .description('Write the sales, marketing, social and review tables to files')
  .option('-f, --format <format>', 'Output format (json, csv)', 'json')
  .option('-o, --out <dir>', 'Output directory', 'out')
  .action(async (options: CliOptions) => {
    try {
      await runGenerate(options, context());
    } catch (error) {
      fail(error);
    }
  });

withDataOptions(program.command('report'))
  .description('Print the dashboard report')
  .option('-c, --campaigns <campaigns>', 'Only include these campaigns')
  .option('--from <date>', 'Only include days on or after this date')
  .option('--to <date>', 'Only include days on or before this date')
  .option('--no-color', 'Disable colored output')
  .action(async (options: CliOptions) => {
    try {
      await runReport(options, context());
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
