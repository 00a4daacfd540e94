import { existsSync, readFileSync } from 'node:fs';
import { loadConfig } from '../workspace/config.js';
import { isLogLevel, setLogDestination, setLogLevel } from '../shared/logger.js';
import { RecordFileSchema, formatIssues } from '../shared/schemas.js';
import { createResolverContext, type ResolverContext } from '../resolver/context.js';
import type { DataProductRecord } from '../location/types.js';
import type { ResolverConfig } from '../workspace/types.js';

export interface RecordOptions {
  record?: string;
  accessUrl?: string;
  cloudAccess?: string;
}

export interface CliSession {
  config: ResolverConfig;
  context: ResolverContext;
}

/**
 * Diagnostics go to stderr so stdout carries only results (`resolve --json`
 * stays parseable). Quiet below warn unless LOG_LEVEL or the config asks.
 */
export function configureCliLogging(
  config: Pick<ResolverConfig, 'logLevel'>,
  env: Readonly<Record<string, string | undefined>> = process.env,
): void {
  const envLevel = env['LOG_LEVEL'];
  setLogDestination('stderr');
  setLogLevel(config.logLevel ?? (isLogLevel(envLevel) ? envLevel : 'warn'));
}

/** Load config and build the resolver context, or print the error and exit. */
export function requireSession(): CliSession {
  let config: ResolverConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error((err as Error).message);
    process.exit(1);
  }
  configureCliLogging(config);
  return { config, context: createResolverContext(config) };
}

/** Read the records named on the command line: a JSON file, or inline flags. */
export function readRecords(opts: RecordOptions): DataProductRecord[] {
  if (opts.record) {
    if (!existsSync(opts.record)) {
      throw new Error(`Record file not found: ${opts.record}`);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(opts.record, 'utf8'));
    } catch (err) {
      throw new Error(`Record file is not valid JSON: ${(err as Error).message}`);
    }
    const parsed = RecordFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid record file: ${formatIssues(parsed.error)}`);
    }
    const rows = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
    return rows.map((row) => ({
      access_url: row.access_url,
      cloud_access:
        row.cloud_access === null || row.cloud_access === undefined || typeof row.cloud_access === 'string'
          ? row.cloud_access
          : JSON.stringify(row.cloud_access),
    }));
  }

  if (!opts.accessUrl) {
    throw new Error('Pass --record <file> or --access-url <url>');
  }
  return [{ access_url: opts.accessUrl, cloud_access: opts.cloudAccess }];
}

/** readRecords(), printing the error and exiting on failure. */
export function requireRecords(opts: RecordOptions): DataProductRecord[] {
  try {
    return readRecords(opts);
  } catch (err) {
    console.error(`Error: ${(err as Error).message}`);
    process.exit(1);
  }
}
