import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runDoctorChecks, type DoctorReport } from '../runtime/doctor.js';
import { formatDoctorReport } from '../cli/commands/doctor.js';

describe('runDoctorChecks', () => {
  let root: string;
  let home: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'cloudloc-doctor-'));
    home = join(root, 'home');
    mkdirSync(join(home, '.cloudloc'), { recursive: true });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('passes with a profile store and credentials for both providers', () => {
    writeFileSync(join(home, '.cloudloc', 'profiles.yaml'), 'profiles: {}\n', 'utf8');
    const report = runDoctorChecks({
      cwd: root,
      home,
      env: {
        AWS_ACCESS_KEY_ID: 'test-key-id',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        GOOGLE_APPLICATION_CREDENTIALS: '/keys/sa.json',
      },
    });
    expect(report.checks.map((c) => c.status)).toEqual(['pass', 'pass', 'pass', 'pass']);
    expect(report.overall).toBe('pass');
    expect(report.summary).toBe('4/4 checks passed');
  });

  it('warns when nothing is configured', () => {
    const report = runDoctorChecks({ cwd: root, home, env: {} });
    expect(report.checks.map((c) => [c.scope, c.name, c.status])).toEqual([
      ['workspace', 'Config', 'pass'],
      ['workspace', 'Credential profile store', 'warn'],
      ['aws', 'Environment credentials', 'warn'],
      ['google-cloud', 'Environment credentials', 'warn'],
    ]);
    expect(report.overall).toBe('warn');
  });

  it('reports which source tokens reach restricted locations', () => {
    writeFileSync(
      join(home, '.cloudloc', 'profiles.yaml'),
      'profiles:\n  team:\n    google-cloud:\n      accessToken: test-token\n',
      'utf8',
    );
    const report = runDoctorChecks({
      cwd: root,
      home,
      env: { AWS_ACCESS_KEY_ID: 'test-key-id', AWS_SECRET_ACCESS_KEY: 'test-secret' },
    });
    expect(report.sources).toEqual([
      { token: 'default', provider: 'on-prem', restricted: false, profiles: [] },
      {
        token: 'aws',
        provider: 'aws',
        restricted: true,
        via: 'AWS_ACCESS_KEY_ID/AWS_SECRET_ACCESS_KEY',
        profiles: [],
      },
      { token: 'gc', provider: 'google-cloud', restricted: false, via: undefined, profiles: ['team'] },
    ]);
  });

  it('fails on malformed environment credentials and a broken config', () => {
    mkdirSync(join(root, '.cloudloc'));
    writeFileSync(join(root, '.cloudloc', 'config.yaml'), 'public_buckets: 3\n', 'utf8');
    const report = runDoctorChecks({ cwd: root, home, env: { AWS_SECRET_ACCESS_KEY: 'test-secret' } });
    expect(report.checks[0]?.status).toBe('fail');
    expect(report.checks[2]?.status).toBe('fail');
    expect(report.overall).toBe('fail');
  });
});

describe('formatDoctorReport', () => {
  it('groups checks by scope and lists source readiness', () => {
    const report: DoctorReport = {
      overall: 'warn',
      checks: [
        { scope: 'workspace', name: 'Config', status: 'pass', message: 'No config file; using defaults' },
        { scope: 'aws', name: 'Environment credentials', status: 'warn', message: 'None set', fix: 'Export AWS keys' },
      ],
      sources: [
        { token: 'default', provider: 'on-prem', restricted: false, profiles: [] },
        { token: 'aws', provider: 'aws', restricted: false, profiles: ['team'] },
        { token: 'gc', provider: 'google-cloud', restricted: true, via: 'GOOGLE_APPLICATION_CREDENTIALS', profiles: [] },
      ],
      summary: '1/2 checks passed – warnings present',
    };

    expect(formatDoctorReport(report, false)).toEqual([
      'workspace',
      '  ✓ Config: No config file; using defaults',
      'aws',
      '  ⚠ Environment credentials: None set',
      '      fix: Export AWS keys',
      '',
      'Sources',
      '  default  on-prem access_url, no credentials needed',
      '  aws      open; restricted with --profile team',
      '  gc       open; restricted via GOOGLE_APPLICATION_CREDENTIALS',
      '',
      'Overall: WARN – 1/2 checks passed – warnings present',
    ]);
  });

  it('says when a provider reaches open locations only', () => {
    const report: DoctorReport = {
      overall: 'pass',
      checks: [],
      sources: [{ token: 'aws', provider: 'aws', restricted: false, profiles: [] }],
      summary: '0/0 checks passed',
    };
    expect(formatDoctorReport(report, false)).toContain('  aws  open locations only');
  });
});
