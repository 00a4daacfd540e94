import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { dump } from 'js-yaml';
import { FileProfileStore } from '../credentials/profile-store.js';

describe('FileProfileStore', () => {
  let tmpDir: string;
  let storePath: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'cloudloc-profiles-test-'));
    storePath = join(tmpDir, 'profiles.yaml');
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeStore(body: unknown): void {
    writeFileSync(storePath, dump(body), 'utf8');
  }

  it('looks up provider material by profile name', () => {
    writeStore({
      profiles: {
        team: { aws: { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' } },
      },
    });
    const store = new FileProfileStore(storePath);
    expect(store.lookup('team', 'aws')).toEqual({
      status: 'found',
      values: { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' },
      profile: 'team',
    });
  });

  it('reports a missing profile as absent', () => {
    writeStore({ profiles: {} });
    const store = new FileProfileStore(storePath);
    expect(store.lookup('nobody', 'aws')).toEqual({
      status: 'absent',
      detail: `no profile "nobody" in ${storePath}`,
    });
  });

  it('does not resolve profile names through the object prototype', () => {
    writeStore({ profiles: { team: { aws: { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' } } } });
    const store = new FileProfileStore(storePath);
    for (const name of ['constructor', 'toString', '__proto__']) {
      expect(store.lookup(name, 'aws')).toEqual({ status: 'absent', detail: `no profile "${name}" in ${storePath}` });
    }
  });

  it('reports a profile without the requested provider as absent', () => {
    writeStore({ profiles: { team: { aws: { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' } } } });
    const store = new FileProfileStore(storePath);
    expect(store.lookup('team', 'google-cloud')).toEqual({
      status: 'absent',
      detail: 'profile "team" has no google-cloud entry',
    });
  });

  it('reports incomplete material as malformed', () => {
    writeStore({ profiles: { team: { aws: { accessKeyId: 'test-key-id' } } } });
    const store = new FileProfileStore(storePath);
    expect(store.lookup('team', 'aws').status).toBe('malformed');
  });

  it('treats a missing file as an empty store', () => {
    const store = new FileProfileStore(storePath);
    expect(store.listProfiles()).toEqual([]);
    expect(store.status()).toEqual({
      healthy: true,
      path: storePath,
      profiles: 0,
      message: 'profile store file does not exist',
    });
  });

  it('survives an invalid store file and reports it unhealthy', () => {
    writeFileSync(storePath, 'profiles: [not, a, map]', 'utf8');
    const store = new FileProfileStore(storePath);
    expect(store.lookup('team', 'aws').status).toBe('absent');
    expect(store.status().healthy).toBe(false);
  });

  it('lists profile names sorted', () => {
    writeStore({ profiles: { zeta: {}, alpha: {} } });
    expect(new FileProfileStore(storePath).listProfiles()).toEqual(['alpha', 'zeta']);
  });
});
