/**
 * Parser for the `cloud_access` descriptor an archive attaches to a data product.
 *
 *   { "<provider>": <LocationObject> | [<LocationObject>, ...], ... }
 *
 * The one-or-many shape is flattened here so nothing downstream sees it.
 * Each entry is validated on its own: a bad entry becomes a ParseError and
 * its siblings are still kept.
 */
import { ParseError } from '../shared/errors.js';
import { LocationObjectSchema, formatIssues } from '../shared/schemas.js';
import { normalizeProviderName } from './providers.js';
import { createLocationSet } from './set.js';
import { DEFAULT_ACCESS_POLICY, type CloudLocation, type CloudProvider, type LocationSet } from './types.js';

export interface ParseResult {
  locations: LocationSet;
  errors: ParseError[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseCloudAccess(text: string | null | undefined, accessUrl: string): ParseResult {
  if (text === null || text === undefined || text.trim() === '') {
    return { locations: createLocationSet(accessUrl), errors: [] };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return {
      locations: createLocationSet(accessUrl),
      errors: [new ParseError(`malformed JSON (${(err as Error).message})`)],
    };
  }

  if (!isPlainObject(raw)) {
    return {
      locations: createLocationSet(accessUrl),
      errors: [new ParseError('expected a JSON object keyed by provider')],
    };
  }

  const locations: CloudLocation[] = [];
  const errors: ParseError[] = [];
  for (const [name, value] of Object.entries(raw)) {
    const parsed = parseProviderEntries(name, value);
    locations.push(...parsed.locations);
    errors.push(...parsed.errors);
  }

  return { locations: createLocationSet(accessUrl, locations), errors };
}

/** Parse the value stored under one descriptor key. */
export function parseProviderEntries(
  name: string,
  value: unknown,
): { locations: CloudLocation[]; errors: ParseError[] } {
  const normalized = normalizeProviderName(name);
  // on-prem only ever comes from access_url; a descriptor key spelled that way is kept by name
  const provider: CloudProvider = normalized === 'on-prem' ? 'other' : normalized;

  const entries: unknown[] | null = Array.isArray(value) ? value : isPlainObject(value) ? [value] : null;
  if (entries === null) {
    return {
      locations: [],
      errors: [new ParseError('expected a location object or a list of them', { provider: name })],
    };
  }

  const locations: CloudLocation[] = [];
  const errors: ParseError[] = [];
  entries.forEach((entry, index) => {
    const result = LocationObjectSchema.safeParse(entry);
    if (!result.success) {
      errors.push(new ParseError(formatIssues(result.error), { provider: name, index }));
      return;
    }
    const { bucket_name, key, region, access } = result.data;
    locations.push({
      provider,
      source: name,
      identifier: bucket_name,
      key,
      // null and "" both mean the archive did not say
      region: region || undefined,
      accessPolicy: access ?? DEFAULT_ACCESS_POLICY,
    });
  });

  return { locations, errors };
}
