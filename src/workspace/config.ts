import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { dump, load } from 'js-yaml';
import { ConfigError } from '../shared/errors.js';
import { ResolverConfigSchema, formatIssues } from '../shared/schemas.js';
import { expandPath, getLocatorPaths } from './paths.js';
import type { ResolverConfig } from './types.js';

export interface LoadConfigOptions {
  cwd?: string;
  home?: string;
  env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Read the resolver config. `CLOUDLOC_CONFIG` overrides the default
 * `.cloudloc/config.yaml`; a missing file means defaults, an invalid one throws.
 */
export function loadConfig(opts: LoadConfigOptions = {}): ResolverConfig {
  const env = opts.env ?? process.env;
  const paths = getLocatorPaths(opts.cwd, opts.home);
  const configPath = env['CLOUDLOC_CONFIG'] ?? paths.config;

  if (!existsSync(configPath)) {
    return {
      defaultSource: 'default',
      profileStore: paths.profileStore,
      publicBuckets: [],
      loadedFrom: null,
    };
  }

  let raw: unknown;
  try {
    raw = load(readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new ConfigError(configPath, (err as Error).message);
  }

  const parsed = ResolverConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(configPath, formatIssues(parsed.error));
  }

  const file = parsed.data;
  return {
    defaultSource: file.default_source,
    profileStore: file.profile_store
      ? expandPath(file.profile_store, dirname(configPath), opts.home)
      : paths.profileStore,
    publicBuckets: file.public_buckets,
    logLevel: file.log_level,
    loadedFrom: configPath,
  };
}

export function writeConfig(configPath: string, config: Omit<ResolverConfig, 'loadedFrom'>): void {
  mkdirSync(dirname(configPath), { recursive: true });
  const body = {
    default_source: config.defaultSource,
    profile_store: config.profileStore,
    public_buckets: config.publicBuckets,
    ...(config.logLevel ? { log_level: config.logLevel } : {}),
  };
  writeFileSync(configPath, dump(body), 'utf8');
}
