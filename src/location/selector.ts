import type { UnsupportedSourceFallback } from '../shared/errors.js';
import { normalizeProviderName } from './providers.js';
import type { CloudLocation, LocationSet, SourceRequest } from './types.js';

export interface Selection {
  location: CloudLocation;
  /** Set when the on-prem entry stands in for a source that has no usable candidate. */
  fallback?: UnsupportedSourceFallback;
  /** The request named a region no candidate has, so the provider's first entry was used. */
  regionRelaxed: boolean;
}

/**
 * Parse a caller source token: `aws`, `aws:us-east-1`, `gc`, `default`, `main-server`, ...
 * Empty input means the default (on-prem) source.
 */
export function parseSourceRequest(token: string): SourceRequest {
  const trimmed = token.trim();
  if (trimmed === '') return { kind: 'default' };

  const sep = trimmed.indexOf(':');
  const name = sep === -1 ? trimmed : trimmed.slice(0, sep);
  const region = sep === -1 ? undefined : trimmed.slice(sep + 1).trim() || undefined;

  const provider = normalizeProviderName(name);
  if (provider === 'on-prem') return { kind: 'default' };
  return region === undefined ? { kind: 'provider', provider, name } : { kind: 'provider', provider, name, region };
}

export function describeSourceRequest(request: SourceRequest): string {
  if (request.kind === 'default') return 'default';
  return request.region ? `${request.name}:${request.region}` : request.name;
}

export function selectLocation(set: LocationSet, request: SourceRequest): Selection {
  if (request.kind === 'default') {
    return { location: set.onPrem, regionRelaxed: false };
  }

  if (request.provider === 'other') {
    return fallBack(set, request, 'provider-unsupported');
  }

  const candidates = set.providers.get(request.provider) ?? [];
  const first = candidates[0];
  if (first === undefined) {
    return fallBack(set, request, 'provider-absent');
  }

  if (request.region === undefined) {
    return { location: first, regionRelaxed: false };
  }

  const wanted = request.region.toLowerCase();
  const match = candidates.find((c) => c.region?.toLowerCase() === wanted);
  return match ? { location: match, regionRelaxed: false } : { location: first, regionRelaxed: true };
}

function fallBack(
  set: LocationSet,
  request: SourceRequest,
  reason: UnsupportedSourceFallback['reason'],
): Selection {
  return {
    location: set.onPrem,
    fallback: { kind: 'unsupported-source-fallback', requested: describeSourceRequest(request), reason },
    regionRelaxed: false,
  };
}
