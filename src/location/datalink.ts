/**
 * Maps the per-source rows of a link-resolution (datalink) service onto a
 * LocationSet. The service advertises `source` options as `provider[:region]`
 * identifiers; each row for an option carries an access_url whose scheme
 * follows the option (s3://, gs://, https://) and may carry its own
 * cloud_access text, which is parsed and merged.
 */
import { ParseError } from '../shared/errors.js';
import { parseCloudAccess, type ParseResult } from './parser.js';
import { normalizeProviderName, PROVIDER_SCHEMES } from './providers.js';
import { createLocationSet, mergeLocationSets } from './set.js';
import { DEFAULT_ACCESS_POLICY, type CloudLocation, type LocationSet } from './types.js';

export interface SourceOption {
  identifier: string;
  label: string;
}

export interface SourceRow {
  source: string;
  access_url: string;
  cloud_access?: string | null;
}

const OBJECT_URI = /^([a-z][a-z0-9+.-]*):\/\/([^/]+)\/(.+)$/i;

export function splitObjectUri(uri: string): { scheme: string; bucket: string; key: string } | null {
  const match = OBJECT_URI.exec(uri.trim());
  if (!match) return null;
  const [, scheme, bucket, key] = match;
  if (scheme === undefined || bucket === undefined || key === undefined) return null;
  return { scheme: scheme.toLowerCase(), bucket, key };
}

export function locationsFromSourceRows(
  accessUrl: string,
  options: readonly SourceOption[],
  rows: readonly SourceRow[],
): ParseResult {
  const advertised = new Set(options.map((o) => o.identifier));
  const locations: CloudLocation[] = [];
  const nested: LocationSet[] = [];
  const errors: ParseError[] = [];

  rows.forEach((row, index) => {
    if (!advertised.has(row.source)) {
      errors.push(new ParseError('source is not among the advertised options', { provider: row.source, index }));
      return;
    }

    const parsed = locationFromRow(row, index);
    if (parsed instanceof ParseError) {
      errors.push(parsed);
    } else if (parsed !== null) {
      locations.push(parsed);
    }

    if (row.cloud_access) {
      const secondary = parseCloudAccess(row.cloud_access, accessUrl);
      nested.push(secondary.locations);
      errors.push(...secondary.errors);
    }
  });

  return {
    locations: mergeLocationSets(createLocationSet(accessUrl, locations), ...nested),
    errors,
  };
}

/** Returns null for on-prem rows: the record's own access_url already covers them. */
function locationFromRow(row: SourceRow, index: number): CloudLocation | ParseError | null {
  const sep = row.source.indexOf(':');
  const name = sep === -1 ? row.source : row.source.slice(0, sep);
  const region = sep === -1 ? undefined : row.source.slice(sep + 1) || undefined;
  const provider = normalizeProviderName(name);
  if (provider === 'on-prem') return null;

  const split = splitObjectUri(row.access_url);
  if (!split) {
    return new ParseError(`access_url "${row.access_url}" is not a bucket/key URI`, { provider: row.source, index });
  }
  if (provider !== 'other' && split.scheme !== PROVIDER_SCHEMES[provider]) {
    return new ParseError(
      `expected a ${PROVIDER_SCHEMES[provider]}:// access_url, got ${split.scheme}://`,
      { provider: row.source, index },
    );
  }

  return {
    provider,
    source: name,
    identifier: split.bucket,
    key: split.key,
    region,
    accessPolicy: DEFAULT_ACCESS_POLICY,
  };
}
