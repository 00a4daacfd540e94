/**
 * Named credential profiles read from a local YAML file, e.g.
 *
 *   profiles:
 *     archive-team:
 *       aws:
 *         accessKeyId: ...
 *         secretAccessKey: ...
 *
 * Read-only: profiles are written by hand or by other tooling. The file is
 * loaded once per store instance, so one instance may be shared across
 * concurrent resolutions.
 */
import { existsSync, readFileSync } from 'node:fs';
import { load } from 'js-yaml';
import { logger } from '../shared/logger.js';
import { ProfileStoreSchema, formatIssues, type ProfileStoreFile } from '../shared/schemas.js';
import { checkCredentialShape } from './validate.js';
import type { CredentialedProvider, CredentialProbe, ProfileStoreStatus } from './types.js';

export class FileProfileStore {
  readonly filePath: string;
  private readonly store: ProfileStoreFile;
  private loadError: string | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.store = this.load();
  }

  private load(): ProfileStoreFile {
    if (!existsSync(this.filePath)) {
      return { profiles: {} };
    }
    let raw: unknown;
    try {
      raw = load(readFileSync(this.filePath, 'utf8'));
    } catch (err) {
      return this.fail(`unreadable profile store: ${(err as Error).message}`);
    }
    const parsed = ProfileStoreSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      return this.fail(`invalid profile store: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  private fail(message: string): ProfileStoreFile {
    this.loadError = message;
    logger.warn('Credential profile store ignored', { path: this.filePath, reason: message });
    return { profiles: {} };
  }

  listProfiles(): string[] {
    return Object.keys(this.store.profiles).sort();
  }

  lookup(name: string, provider: CredentialedProvider): CredentialProbe {
    const profile = Object.hasOwn(this.store.profiles, name) ? this.store.profiles[name] : undefined;
    if (!profile) {
      return { status: 'absent', detail: `no profile "${name}" in ${this.filePath}` };
    }
    const values = profile[provider];
    if (!values) {
      return { status: 'absent', detail: `profile "${name}" has no ${provider} entry` };
    }
    const probe = checkCredentialShape(provider, values);
    return probe.status === 'found' ? { ...probe, profile: name } : probe;
  }

  status(): ProfileStoreStatus {
    if (this.loadError) {
      return { healthy: false, path: this.filePath, profiles: 0, message: this.loadError };
    }
    return {
      healthy: true,
      path: this.filePath,
      profiles: this.listProfiles().length,
      message: existsSync(this.filePath) ? undefined : 'profile store file does not exist',
    };
  }
}
