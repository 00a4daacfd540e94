import type { LogLevel } from '../shared/logger.js';

export interface ResolverConfig {
  /** Source token used when the caller names none. */
  defaultSource: string;
  /** Absolute path of the YAML credential profile store. */
  profileStore: string;
  /** Buckets known to allow anonymous reads. */
  publicBuckets: string[];
  logLevel?: LogLevel;
  /** File the config was read from; null when running on defaults. */
  loadedFrom: string | null;
}

export interface LocatorPaths {
  root: string;         // .cloudloc/
  config: string;       // .cloudloc/config.yaml
  profileStore: string; // ~/.cloudloc/profiles.yaml
}
