/**
 * Catalog tables can carry cloud copies as plain columns tagged with a
 * `meta.ref.<provider>` UCD (`meta.ref.aws` holding `s3://bucket/key`). This
 * maps the columns of one row into a LocationSet.
 *
 * Only UCDs whose suffix names a fetchable cloud provider count: standard
 * UCDs such as `meta.ref.url` or `meta.ref.ivoid` share the prefix.
 */
import { ParseError } from '../shared/errors.js';
import type { ParseResult } from './parser.js';
import { splitObjectUri } from './datalink.js';
import { normalizeProviderName, PROVIDER_SCHEMES } from './providers.js';
import { createLocationSet } from './set.js';
import { DEFAULT_ACCESS_POLICY, type CloudLocation } from './types.js';

export interface RefColumn {
  name: string;
  ucd?: string | null;
  value: unknown;
}

const REF_UCD = /^meta\.ref\.([a-z0-9-]+)$/i;

export function locationsFromRefColumns(accessUrl: string, columns: readonly RefColumn[]): ParseResult {
  const locations: CloudLocation[] = [];
  const errors: ParseError[] = [];

  columns.forEach((column, index) => {
    const suffix = column.ucd ? REF_UCD.exec(column.ucd.trim())?.[1] : undefined;
    if (suffix === undefined) return;
    const provider = normalizeProviderName(suffix);
    if (provider !== 'aws' && provider !== 'google-cloud') return;

    // empty cells are rows without a cloud copy
    if (column.value === null || column.value === undefined || column.value === '') return;
    if (typeof column.value !== 'string') {
      errors.push(new ParseError(`expected a URI string, got ${typeof column.value}`, { provider: column.name, index }));
      return;
    }

    const split = splitObjectUri(column.value);
    if (!split) {
      errors.push(new ParseError(`"${column.value}" is not a bucket/key URI`, { provider: column.name, index }));
      return;
    }
    if (split.scheme !== PROVIDER_SCHEMES[provider]) {
      errors.push(
        new ParseError(`expected a ${PROVIDER_SCHEMES[provider]}:// URI, got ${split.scheme}://`, {
          provider: column.name,
          index,
        }),
      );
      return;
    }

    locations.push({
      provider,
      source: suffix,
      identifier: split.bucket,
      key: split.key,
      accessPolicy: DEFAULT_ACCESS_POLICY,
    });
  });

  return { locations: createLocationSet(accessUrl, locations), errors };
}
