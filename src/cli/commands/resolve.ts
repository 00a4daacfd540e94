import type { Command } from 'commander';
import { resolveBatch, type ResolveResult } from '../../resolver/index.js';
import { safeStringify } from '../../shared/redact.js';
import { requireRecords, requireSession, type RecordOptions } from '../cli-shared.js';
import type { CredentialOverride } from '../../credentials/types.js';

interface ResolveOptions extends RecordOptions {
  source?: string;
  profile?: string;
  json: boolean;
}

export function formatResult(result: ResolveResult, index: number, total: number): string[] {
  const lines: string[] = [];
  const prefix = total > 1 ? `[${index}] ` : '';
  for (const err of result.parseErrors) {
    lines.push(`${prefix}warning: ${err.message}`);
  }
  if (result.fallback) {
    lines.push(`${prefix}note: source "${result.fallback.requested}" unavailable (${result.fallback.reason}); using on-prem`);
  }
  if (!result.ok) {
    lines.push(`${prefix}error: ${result.error.message}`);
    return lines;
  }
  const { handle } = result;
  lines.push(`${prefix}${handle.uri}`);
  lines.push(`${prefix}  provider:    ${handle.originProvider}${handle.region ? ` (${handle.region})` : ''}`);
  lines.push(`${prefix}  access:      ${handle.accessPolicy}${handle.regionVerified === false ? ' (region not verified)' : ''}`);
  const creds = handle.credentials;
  lines.push(
    `${prefix}  credentials: ${creds ? `${creds.origin}${creds.profile ? ` (${creds.profile})` : ''}` : 'none'}`,
  );
  if (result.regionRelaxed) {
    lines.push(`${prefix}  note:        requested region not offered; first ${handle.originProvider} entry used`);
  }
  return lines;
}

export function registerResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve a data product record to a fetch handle')
    .option('-r, --record <file>', 'JSON file holding one record or a list of records')
    .option('-u, --access-url <url>', 'On-prem access_url of the product')
    .option('-c, --cloud-access <json>', 'cloud_access descriptor text')
    .option('-s, --source <token>', 'Source: default, aws, aws:<region>, gc, ...')
    .option('-p, --profile <name>', 'Credential profile to use for restricted locations')
    .option('--json', 'Print results as JSON (credential values redacted)', false)
    .action((opts: ResolveOptions) => {
      const { config, context } = requireSession();
      const records = requireRecords(opts);

      const override: CredentialOverride | undefined = opts.profile ? { profile: opts.profile } : undefined;
      const results = resolveBatch(records, opts.source ?? config.defaultSource, override, context);

      if (opts.json) {
        console.log(
          safeStringify(
            results.map((r) =>
              r.ok
                ? r
                : { ...r, error: { name: r.error.name, reason: r.error.reason, message: r.error.message, attempts: r.error.attempts } },
            ),
            2,
          ),
        );
      } else {
        results.forEach((r, i) => {
          for (const line of formatResult(r, i, results.length)) console.log(line);
        });
      }

      if (results.some((r) => !r.ok)) process.exit(1);
    });
}
