import { describe, it, expect } from '@jest/globals';
import { resolve, resolveBatch, resolveLocations } from '../resolver/index.js';
import { identityClassifier, publicBucketClassifier } from '../location/classifier.js';
import { locationsFromSourceRows } from '../location/datalink.js';
import { CredentialError } from '../shared/errors.js';
import type { ResolverContext } from '../resolver/context.js';
import { createFakeCredentialProvider, TEST_AWS_VALUES } from './test-helpers.js';

const ACCESS_URL = 'https://archive.example.org/data/obs/a/b.fits';

function contextWith(opts: Parameters<typeof createFakeCredentialProvider>[0] = {}): ResolverContext {
  return { credentialProvider: createFakeCredentialProvider(opts), classifier: identityClassifier };
}

describe('resolve', () => {
  it('resolves an aws descriptor to an s3 handle', () => {
    const record = {
      access_url: ACCESS_URL,
      cloud_access: '{"aws": {"bucket_name":"heasarc-bucket","key":"a/b.fits","region":"us-east-1","access":"open"}}',
    };
    const result = resolve(record, 'aws', undefined, contextWith());
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.handle.scheme).toBe('s3');
    expect(result.handle.uri).toBe('s3://heasarc-bucket/a/b.fits');
    expect(result.fallback).toBeUndefined();
  });

  it('selects the first entry of a provider list', () => {
    const record = {
      access_url: ACCESS_URL,
      cloud_access:
        '{"aws": [{"bucket_name":"b1","key":"k1","access":"open"},{"bucket_name":"b2","key":"k2","access":"open"}]}',
    };
    const result = resolve(record, 'aws', undefined, contextWith());
    expect(result.ok && result.handle.uri).toBe('s3://b1/k1');
  });

  it('falls back to the unchanged access_url when the source is missing', () => {
    const record = { access_url: ACCESS_URL, cloud_access: '{"aws": {"bucket_name":"b1","key":"k1"}}' };
    const result = resolve(record, 'gc', undefined, contextWith());
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.handle.uri).toBe(ACCESS_URL);
    expect(result.handle.scheme).toBe('https');
    expect(result.handle.credentials).toBeNull();
    expect(result.fallback).toEqual({ kind: 'unsupported-source-fallback', requested: 'gc', reason: 'provider-absent' });
  });

  it('returns on-prem for the default sentinel even when cloud entries exist', () => {
    const record = { access_url: ACCESS_URL, cloud_access: '{"aws": {"bucket_name":"b1","key":"k1","access":"open"}}' };
    const result = resolve(record, { kind: 'default' }, undefined, contextWith());
    expect(result.ok && result.handle.originProvider).toBe('on-prem');
    expect(result.ok && result.fallback).toBeUndefined();
  });

  it('fails a restricted location with no credentials anywhere', () => {
    const context = contextWith();
    const record = {
      access_url: ACCESS_URL,
      cloud_access: '{"aws": {"bucket_name":"b1","key":"k1","access":"restricted"}}',
    };
    const result = resolve(record, 'aws', undefined, context);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CredentialError);
    expect(result.error.reason).toBe('no-credentials-available');
    expect(result.error.attempts.map((a) => a.step)).toEqual(['anonymous', 'environment']);
  });

  it('treats a descriptor entry without access as restricted', () => {
    const record = { access_url: ACCESS_URL, cloud_access: '{"aws": {"bucket_name":"b1","key":"k1"}}' };
    const result = resolve(record, 'aws', undefined, contextWith());
    expect(!result.ok && result.error.reason).toBe('no-credentials-available');
  });

  it('attaches environment credentials to restricted handles', () => {
    const record = { access_url: ACCESS_URL, cloud_access: '{"aws": {"bucket_name":"b1","key":"k1"}}' };
    const result = resolve(record, 'aws', undefined, contextWith({ env: { aws: { status: 'found', values: TEST_AWS_VALUES } } }));
    expect(result.ok && result.handle.credentials).toEqual({ origin: 'environment', values: TEST_AWS_VALUES });
  });

  it('propagates the region policy tag', () => {
    const record = {
      access_url: ACCESS_URL,
      cloud_access: '{"aws": {"bucket_name":"b1","key":"k1","region":"us-west-2","access":"region"}}',
    };
    const result = resolve(record, 'aws', undefined, contextWith({ env: { aws: { status: 'found', values: TEST_AWS_VALUES } } }));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.handle.accessPolicy).toBe('region');
    expect(result.handle.regionVerified).toBe(false);
  });

  it('lets the classifier open a known public bucket', () => {
    const provider = createFakeCredentialProvider();
    const record = { access_url: ACCESS_URL, cloud_access: '{"aws": {"bucket_name":"open-data","key":"k1"}}' };
    const result = resolve(record, 'aws', { profile: 'team' }, {
      credentialProvider: provider,
      classifier: publicBucketClassifier(['open-data']),
    });
    expect(result.ok && result.handle.accessPolicy).toBe('open');
    expect(provider.fromProfile).not.toHaveBeenCalled();
  });

  it.each(['constructor', '__proto__', 'toString'])('falls back to on-prem for the %s source token', (token) => {
    const record = {
      access_url: ACCESS_URL,
      cloud_access: `{"${token}": {"bucket_name":"b1","key":"k1","access":"open"}}`,
    };
    const provider = createFakeCredentialProvider();
    const result = resolve(record, token, undefined, { credentialProvider: provider, classifier: identityClassifier });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.handle).toEqual({
      scheme: 'https',
      uri: ACCESS_URL,
      accessPolicy: 'open',
      credentials: null,
      originProvider: 'on-prem',
    });
    expect(result.fallback).toEqual({ kind: 'unsupported-source-fallback', requested: token, reason: 'provider-unsupported' });
    expect(provider.fromEnvironment).not.toHaveBeenCalled();
  });

  it('resolves an entry whose region is null', () => {
    const record = {
      access_url: ACCESS_URL,
      cloud_access: '{"aws": {"bucket_name":"b1","key":"k1","region":null,"access":"open"}}',
    };
    const result = resolve(record, 'aws', undefined, contextWith());
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.parseErrors).toEqual([]);
    expect(result.handle.uri).toBe('s3://b1/k1');
    expect(result.handle.region).toBeUndefined();
  });

  it('reports descriptor errors and still resolves on-prem', () => {
    const result = resolve({ access_url: ACCESS_URL, cloud_access: 'not json' }, 'aws', undefined, contextWith());
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.parseErrors).toHaveLength(1);
    expect(result.handle.uri).toBe(ACCESS_URL);
    expect(result.fallback?.reason).toBe('provider-absent');
  });
});

describe('resolveLocations', () => {
  it('resolves candidates collected from datalink rows', () => {
    const { locations } = locationsFromSourceRows(
      ACCESS_URL,
      [{ identifier: 'aws:us-east-1', label: 'AWS' }],
      [{ source: 'aws:us-east-1', access_url: 's3://archive-bucket/a/b.fits' }],
    );
    const result = resolveLocations(locations, 'aws:us-east-1', undefined, contextWith({
      env: { aws: { status: 'found', values: TEST_AWS_VALUES } },
    }));
    expect(result.ok && result.handle.uri).toBe('s3://archive-bucket/a/b.fits');
    expect(result.ok && result.handle.region).toBe('us-east-1');
  });
});

describe('resolveBatch', () => {
  it('resolves each record independently and in order', () => {
    const results = resolveBatch(
      [
        { access_url: ACCESS_URL, cloud_access: '{"aws": {"bucket_name":"b1","key":"k1","access":"open"}}' },
        { access_url: ACCESS_URL, cloud_access: '{"aws": {"bucket_name":"b2","key":"k2"}}' },
        { access_url: 'https://archive.example.org/other.fits' },
      ],
      'aws',
      undefined,
      contextWith(),
    );
    expect(results.map((r) => (r.ok ? r.handle.uri : r.error.reason))).toEqual([
      's3://b1/k1',
      'no-credentials-available',
      'https://archive.example.org/other.fits',
    ]);
  });
});
