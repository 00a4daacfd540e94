import { loadConfig, type LoadConfigOptions } from '../workspace/config.js';
import { FileProfileStore } from '../credentials/profile-store.js';
import { LocalCredentialProvider } from '../credentials/local-provider.js';
import { getLocatorPaths } from '../workspace/paths.js';
import type { CredentialedProvider, CredentialProbe } from '../credentials/types.js';
import type { ResolverConfig } from '../workspace/types.js';

export type CheckStatus = 'pass' | 'fail' | 'warn';

/** `workspace` covers config and the profile store; the rest are per provider. */
export type CheckScope = 'workspace' | CredentialedProvider;

export interface DoctorCheck {
  scope: CheckScope;
  name: string;
  status: CheckStatus;
  message: string;
  fix?: string;
}

/** What a source token can reach with the credentials found on this machine. */
export interface SourceReadiness {
  token: string;
  provider: 'on-prem' | CredentialedProvider;
  /** Restricted locations resolve without --profile. */
  restricted: boolean;
  via?: string;
  /** Stored profiles holding usable material for the provider. */
  profiles: string[];
}

export interface DoctorReport {
  overall: CheckStatus;
  checks: DoctorCheck[];
  sources: SourceReadiness[];
  summary: string;
}

function check(
  scope: CheckScope,
  name: string,
  fn: () => { status: CheckStatus; message: string; fix?: string },
): DoctorCheck {
  try {
    return { scope, name, ...fn() };
  } catch (err) {
    return {
      scope,
      name,
      status: 'fail',
      message: `Check threw: ${(err as Error).message}`,
    };
  }
}

const ENV_FIXES: Record<CredentialedProvider, string> = {
  aws: 'Export AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY, or AWS_PROFILE naming a stored profile',
  'google-cloud': 'Export GOOGLE_APPLICATION_CREDENTIALS pointing at a service account key file',
};

const SOURCE_TOKENS: Record<CredentialedProvider, string> = {
  aws: 'aws',
  'google-cloud': 'gc',
};

function envCheck(provider: CredentialedProvider, probe: CredentialProbe): DoctorCheck {
  return check(provider, 'Environment credentials', () => {
    switch (probe.status) {
      case 'found':
        return { status: 'pass', message: `Found via ${probe.detail ?? 'environment'}` };
      case 'absent':
        return {
          status: 'warn',
          message: 'None set; only open locations will resolve without --profile',
          fix: ENV_FIXES[provider],
        };
      case 'malformed':
        return { status: 'fail', message: probe.detail, fix: ENV_FIXES[provider] };
    }
  });
}

export function runDoctorChecks(opts: LoadConfigOptions = {}): DoctorReport {
  const env = opts.env ?? process.env;
  const checks: DoctorCheck[] = [];

  let config: ResolverConfig | null = null;
  let configError: string | null = null;
  try {
    config = loadConfig(opts);
  } catch (err) {
    configError = (err as Error).message;
  }
  const loaded = config;
  checks.push(
    check('workspace', 'Config', () => {
      if (!loaded) {
        return { status: 'fail', message: configError ?? 'unreadable', fix: 'Fix the YAML or unset CLOUDLOC_CONFIG' };
      }
      return loaded.loadedFrom
        ? { status: 'pass', message: `Loaded ${loaded.loadedFrom}` }
        : { status: 'pass', message: 'No config file; using defaults' };
    }),
  );

  const storePath = loaded?.profileStore ?? getLocatorPaths(opts.cwd, opts.home).profileStore;
  const store = new FileProfileStore(storePath);
  checks.push(
    check('workspace', 'Credential profile store', () => {
      const status = store.status();
      if (!status.healthy) {
        return { status: 'fail', message: status.message ?? 'unreadable', fix: `Fix or remove ${status.path}` };
      }
      if (status.message) {
        return { status: 'warn', message: `${status.path}: ${status.message}`, fix: 'Only needed for --profile' };
      }
      return { status: 'pass', message: `${status.profiles} profile(s) in ${status.path}` };
    }),
  );

  const credentials = new LocalCredentialProvider({ env: { ...env }, profileStore: store });
  const sources: SourceReadiness[] = [{ token: 'default', provider: 'on-prem', restricted: false, profiles: [] }];
  for (const provider of ['aws', 'google-cloud'] as const) {
    const probe = credentials.fromEnvironment(provider);
    checks.push(envCheck(provider, probe));
    sources.push({
      token: SOURCE_TOKENS[provider],
      provider,
      restricted: probe.status === 'found',
      via: probe.status === 'found' ? probe.detail : undefined,
      profiles: store.listProfiles().filter((name) => store.lookup(name, provider).status === 'found'),
    });
  }

  const hasFailure = checks.some((c) => c.status === 'fail');
  const hasWarning = checks.some((c) => c.status === 'warn');
  const overall: CheckStatus = hasFailure ? 'fail' : hasWarning ? 'warn' : 'pass';

  const passCount = checks.filter((c) => c.status === 'pass').length;
  const summary =
    `${passCount}/${checks.length} checks passed` +
    (hasFailure ? ' – FAILURES detected' : '') +
    (hasWarning && !hasFailure ? ' – warnings present' : '');

  return { overall, checks, sources, summary };
}
