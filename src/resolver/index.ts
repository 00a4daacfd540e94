import { logger } from '../shared/logger.js';
import { parseCloudAccess } from '../location/parser.js';
import { describeSourceRequest, parseSourceRequest, selectLocation } from '../location/selector.js';
import { resolveCredentials } from '../credentials/resolver.js';
import { buildFetchHandle, type FetchHandle } from './handle.js';
import { defaultResolverContext, type ResolverContext } from './context.js';
import type { CredentialAttempt, CredentialError, ParseError, UnsupportedSourceFallback } from '../shared/errors.js';
import type { DataProductRecord, LocationSet, SourceRequest } from '../location/types.js';
import type { CredentialOverride } from '../credentials/types.js';

export type ResolveResult =
  | {
      ok: true;
      handle: FetchHandle;
      fallback?: UnsupportedSourceFallback;
      /** A requested region had no candidate; the provider's first entry was used. */
      regionRelaxed: boolean;
      attempts: readonly CredentialAttempt[];
      parseErrors: readonly ParseError[];
    }
  | {
      ok: false;
      error: CredentialError;
      fallback?: UnsupportedSourceFallback;
      parseErrors: readonly ParseError[];
    };

/**
 * Resolve one catalog record to a fetch handle for the requested source.
 * Descriptor problems are reported in `parseErrors` and never block the
 * on-prem path; credential failures come back as `{ ok: false }`.
 */
export function resolve(
  record: DataProductRecord,
  source: SourceRequest | string,
  override?: CredentialOverride,
  context: ResolverContext = defaultResolverContext(),
): ResolveResult {
  const { locations, errors } = parseCloudAccess(record.cloud_access, record.access_url);
  for (const err of errors) {
    logger.warn('Skipping cloud_access entry', { provider: err.provider, index: err.index, reason: err.message });
  }
  return resolveLocations(locations, source, override, context, errors);
}

/** Same as resolve(), for candidates that were already collected (e.g. from datalink rows). */
export function resolveLocations(
  locations: LocationSet,
  source: SourceRequest | string,
  override?: CredentialOverride,
  context: ResolverContext = defaultResolverContext(),
  parseErrors: readonly ParseError[] = [],
): ResolveResult {
  const request = typeof source === 'string' ? parseSourceRequest(source) : source;
  const selection = selectLocation(locations, request);

  if (selection.fallback) {
    logger.info('Requested source unavailable; using on-prem location', {
      requested: selection.fallback.requested,
      reason: selection.fallback.reason,
    });
  } else {
    logger.debug('Selected location', {
      source: describeSourceRequest(request),
      provider: selection.location.provider,
      bucket: selection.location.identifier,
      regionRelaxed: selection.regionRelaxed,
    });
  }

  const policy = context.classifier.classify(selection.location);
  const location = policy === selection.location.accessPolicy ? selection.location : { ...selection.location, accessPolicy: policy };

  const creds = resolveCredentials(location, policy, context.credentialProvider, override);
  if (!creds.ok) {
    return { ok: false, error: creds.error, fallback: selection.fallback, parseErrors };
  }

  if (policy === 'region') {
    logger.warn('Region-restricted location; execution region not verified', {
      bucket: location.identifier,
      region: location.region ?? null,
    });
  }

  return {
    ok: true,
    handle: buildFetchHandle(location, creds.credentials),
    fallback: selection.fallback,
    regionRelaxed: selection.regionRelaxed,
    attempts: creds.attempts,
    parseErrors,
  };
}

/**
 * Resolve several records independently. Results keep the input order; one
 * record failing does not affect the others.
 */
export function resolveBatch(
  records: readonly DataProductRecord[],
  source: SourceRequest | string,
  override?: CredentialOverride,
  context: ResolverContext = defaultResolverContext(),
): ResolveResult[] {
  return records.map((record) => resolve(record, source, override, context));
}
