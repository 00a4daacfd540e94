import type { Command } from 'commander';
import { runDoctorChecks, type CheckStatus, type DoctorReport, type SourceReadiness } from '../../runtime/doctor.js';
import { setLogDestination } from '../../shared/logger.js';

const ICONS: Record<CheckStatus, string> = { pass: '✓', warn: '⚠', fail: '✗' };
const COLORS: Record<CheckStatus, string> = { pass: '\x1b[32m', warn: '\x1b[33m', fail: '\x1b[31m' };
const RESET = '\x1b[0m';

function describeReadiness(source: SourceReadiness): string {
  if (source.provider === 'on-prem') return 'on-prem access_url, no credentials needed';
  const parts = ['open'];
  if (source.restricted) parts.push(`restricted via ${source.via ?? 'environment'}`);
  if (source.profiles.length > 0) parts.push(`restricted with --profile ${source.profiles.join('|')}`);
  return parts.length === 1 ? 'open locations only' : parts.join('; ');
}

/**
 * Render a report: checks grouped by scope (workspace first, then one block
 * per provider), a table of source tokens, then the overall line.
 */
export function formatDoctorReport(report: DoctorReport, color = true): string[] {
  const paint = (status: CheckStatus, text: string) => (color ? `${COLORS[status]}${text}${RESET}` : text);
  const lines: string[] = [];

  const scopes = [...new Set(report.checks.map((c) => c.scope))];
  for (const scope of scopes) {
    lines.push(scope);
    for (const c of report.checks.filter((entry) => entry.scope === scope)) {
      lines.push(`  ${paint(c.status, `${ICONS[c.status]} ${c.name}`)}: ${c.message}`);
      if (c.fix) lines.push(`      fix: ${c.fix}`);
    }
  }

  lines.push('', 'Sources');
  const width = Math.max(...report.sources.map((s) => s.token.length));
  for (const source of report.sources) {
    lines.push(`  ${source.token.padEnd(width)}  ${describeReadiness(source)}`);
  }

  lines.push('', paint(report.overall, `Overall: ${report.overall.toUpperCase()} – ${report.summary}`));
  return lines;
}

export function registerDoctorCommand(program: Command): void {
  program
    .command('doctor')
    .description('Check config and credentials, and show which sources can resolve')
    .option('--no-color', 'Plain output')
    .action((opts: { color: boolean }) => {
      setLogDestination('stderr');
      const report = runDoctorChecks();
      for (const line of formatDoctorReport(report, opts.color)) console.log(line);
      if (report.overall === 'fail') process.exit(1);
    });
}
