/**
 * Command implementations behind the beauty-dash CLI
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import { z } from 'zod';
import {
  BeautySynth,
  createRandom,
  formatDay,
  formatTable,
  loadEnvSettings,
  toValidationError
} from 'beauty-synth';
import type { GenerateOptions, GenerationEvents, GenerationResult, MockDataset, TableName } from 'beauty-synth';
import { parseFilters } from './filters.js';
import { buildReport, renderReport } from './report.js';

/** Days shown when nothing is configured: the last 90 days plus today */
export const DEFAULT_HORIZON_DAYS = 91;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const list = z
  .string()
  .transform(value =>
    value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  )
  .optional();

export const CliOptionsSchema = z.object({
  start: z.string().optional(),
  days: z
    .union([z.number(), z.string()])
    .pipe(z.coerce.number().int('Days must be a whole number').nonnegative('Days cannot be negative'))
    .optional(),
  brands: list,
  seed: z.string().optional(),
  campaigns: list,
  from: z.string().optional(),
  to: z.string().optional(),
  format: z.string().default('json').pipe(z.enum(['json', 'csv'])),
  out: z.string().default('out'),
  verbose: z.boolean().default(false),
  color: z.boolean().default(true)
});

export type CliOptions = z.input<typeof CliOptionsSchema>;
type ParsedCliOptions = z.output<typeof CliOptionsSchema>;

export interface RunContext {
  env: NodeJS.ProcessEnv;
  today: Date;
  log: (message: string) => void;
}

export function parseCliOptions(raw: CliOptions): ParsedCliOptions {
  const parsed = CliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'Invalid options');
  }
  return parsed.data;
}

/**
 * Flags win over BEAUTY_SYNTH_* variables, which win over the defaults.
 * Without a start date the horizon ends today.
 */
export function resolveGenerateOptions(options: ParsedCliOptions, context: RunContext): GenerateOptions {
  const env = loadEnvSettings(context.env);
  const days = options.days ?? env.days ?? DEFAULT_HORIZON_DAYS;
  const brands = options.brands ?? env.brands;
  const seed = options.seed ?? env.seed;

  const today = Date.UTC(
    context.today.getUTCFullYear(),
    context.today.getUTCMonth(),
    context.today.getUTCDate()
  );
  const startDate = options.start ?? formatDay(new Date(today - Math.max(days - 1, 0) * MS_PER_DAY));

  return {
    startDate,
    days,
    ...(brands && { brands }),
    ...(seed !== undefined && { seed })
  };
}

/**
 * Print lifecycle events as they happen
 */
export function attachLogger(synth: BeautySynth, log: (message: string) => void): void {
  synth.on('generation:start', ({ options }: GenerationEvents['generation:start']) => {
    log(
      chalk.cyan(
        `Generating ${options.days} days from ${formatDay(options.startDate)} for ${options.brands.join(', ')}`
      )
    );
  });
  synth.on('generation:cached', ({ key }: GenerationEvents['generation:cached']) => {
    log(chalk.gray(`Using cached dataset (${key})`));
  });
  synth.on('generation:complete', ({ rowCounts, duration }: GenerationEvents['generation:complete']) => {
    const counts = Object.entries(rowCounts)
      .map(([table, count]) => `${table}=${count}`)
      .join(' ');
    log(chalk.green(`Generated ${counts} in ${duration}ms`));
  });
  synth.on('generation:error', ({ error }: GenerationEvents['generation:error']) => {
    log(chalk.red(`Generation failed: ${error instanceof Error ? error.message : String(error)}`));
  });
}

async function generate(options: ParsedCliOptions, context: RunContext): Promise<GenerationResult> {
  const env = loadEnvSettings(context.env);
  const synth = new BeautySynth(env.config);
  if (options.verbose) {
    attachLogger(synth, context.log);
  }
  return synth.generate(resolveGenerateOptions(options, context));
}

const TABLES: readonly TableName[] = ['sales', 'marketing', 'social', 'reviews'];

/**
 * Write the four tables and the campaign list into `options.out`
 */
export async function runGenerate(raw: CliOptions, context: RunContext): Promise<string[]> {
  const options = parseCliOptions(raw);
  const { data } = await generate(options, context);

  await fs.mkdir(options.out, { recursive: true });

  const written: string[] = [];
  for (const table of TABLES) {
    const file = path.join(options.out, `${table}.${options.format}`);
    await fs.writeFile(file, formatTable(tableRows(data, table), options.format), 'utf-8');
    written.push(file);
  }

  const campaignsFile = path.join(options.out, 'campaigns.json');
  await fs.writeFile(campaignsFile, JSON.stringify(data.campaigns, null, 2), 'utf-8');
  written.push(campaignsFile);

  context.log(chalk.green(`Wrote ${written.length} files to ${options.out}`));
  return written;
}

/**
 * Print the dashboard report for the filtered dataset
 */
export async function runReport(raw: CliOptions, context: RunContext): Promise<string> {
  const options = parseCliOptions(raw);
  const result = await generate(options, context);
  const filters = parseFilters({
    ...(options.brands && { brands: options.brands }),
    ...(options.campaigns && { campaigns: options.campaigns }),
    ...(options.from !== undefined && { from: options.from }),
    ...(options.to !== undefined && { to: options.to })
  });

  const random = createRandom(result.metadata.seed).fork('report');
  const text = renderReport(buildReport(result.data, filters, random), { color: options.color });
  context.log(text);
  return text;
}

function tableRows(data: MockDataset, table: TableName): readonly object[] {
  switch (table) {
    case 'sales':
      return data.sales;
    case 'marketing':
      return data.marketing;
    case 'social':
      return data.social;
    case 'reviews':
      return data.reviews;
  }
}
