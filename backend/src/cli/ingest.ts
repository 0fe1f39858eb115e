#!/usr/bin/env node
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import type { IngestionSummary } from '@tickwatch/shared';
import { AppError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { DynamoSightingRepository } from '../lib/repositories/dynamo.js';
import type { SightingRepository } from '../lib/repositories/types.js';
import { ingestFile, type IngestDeps } from '../lib/services/ingestion.js';
import { createAnalyticsSettings, type AnalyticsSettings } from '../lib/settings.js';

export const USAGE = 'Usage: tickwatch-ingest <file.xlsx|file.csv> [--reset] [--dry-run]';

export const ExitCode = {
  OK: 0,
  FAILED: 1,
  USAGE: 2,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliDeps {
  repository?: SightingRepository;
  settings?: AnalyticsSettings;
  out?: (line: string) => void;
  err?: (line: string) => void;
  ingest?: Pick<IngestDeps, 'now' | 'generateId' | 'logger'>;
}

const OPTIONS = {
  reset: { type: 'boolean', default: false },
  'dry-run': { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({ args: [...argv], allowPositionals: true, options: OPTIONS });
}

export function formatSummary(summary: IngestionSummary): string[] {
  const lines = [
    `${summary.dryRun ? 'Validated' : 'Imported'} ${summary.source} (import ${summary.importId})`,
    `  rows: ${summary.totalRows}, accepted: ${summary.accepted}, rejected: ${summary.rejected}`,
  ];
  for (const [reason, count] of Object.entries(summary.rejectionCounts)) {
    lines.push(`  ${reason}: ${count}`);
  }
  for (const rejection of summary.rejections) {
    const detail = [rejection.field, rejection.value].filter((part) => part !== undefined).join(' = ');
    lines.push(`  row ${rejection.row}: ${rejection.reason}${detail ? ` (${detail})` : ''}`);
  }
  for (const warning of summary.warnings) {
    lines.push(`  row ${warning.row}: ${warning.kind} "${warning.value}"`);
  }
  if (summary.dryRun) {
    lines.push('  dry run: nothing was written');
  }
  return lines;
}

/** Run the importer for `argv` (arguments after the script name) */
export async function main(argv: readonly string[], deps: CliDeps = {}): Promise<ExitCode> {
  const out = deps.out ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = deps.err ?? ((line: string) => process.stderr.write(`${line}\n`));

  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    err(error instanceof Error ? error.message : String(error));
    err(USAGE);
    return ExitCode.USAGE;
  }

  if (parsed.values.help) {
    out(USAGE);
    return ExitCode.OK;
  }

  const [path, ...extra] = parsed.positionals;
  if (path === undefined || extra.length > 0) {
    err(USAGE);
    return ExitCode.USAGE;
  }

  try {
    const summary = await ingestFile(path, {
      ...deps.ingest,
      repository: deps.repository ?? new DynamoSightingRepository(),
      settings: deps.settings ?? createAnalyticsSettings(),
      reset: parsed.values.reset,
      dryRun: parsed.values['dry-run'],
    });
    formatSummary(summary).forEach(out);
    return ExitCode.OK;
  } catch (error) {
    if (error instanceof AppError) {
      err(`${error.code}: ${error.message}`);
      if (error.details) err(JSON.stringify(error.details));
      return ExitCode.FAILED;
    }
    logger.error({ error }, 'Ingestion failed');
    err('Ingestion failed unexpectedly');
    return ExitCode.FAILED;
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error({ error }, 'Ingestion crashed');
      process.exitCode = ExitCode.FAILED;
    }
  );
}
