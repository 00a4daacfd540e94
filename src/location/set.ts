import type { CloudLocation, CloudProvider, LocationSet } from './types.js';

const URL_SCHEME = /^([a-z][a-z0-9+.-]*):/i;

/** The synthetic entry derived from a record's plain access_url; always `open`. */
export function onPremLocation(accessUrl: string): CloudLocation {
  let identifier = accessUrl;
  let key = '';
  // a relative or otherwise unparseable URL keeps the whole string as its identity
  if (URL.canParse(accessUrl)) {
    const parsed = new URL(accessUrl);
    identifier = parsed.host;
    key = `${parsed.pathname}${parsed.search}`.replace(/^\//, '');
  }
  const location: CloudLocation = {
    provider: 'on-prem',
    source: 'on-prem',
    identifier,
    key,
    accessPolicy: 'open',
    url: accessUrl,
  };
  return Object.freeze(location);
}

export function urlScheme(url: string): string | undefined {
  return URL_SCHEME.exec(url)?.[1]?.toLowerCase();
}

export function sameLocation(a: CloudLocation, b: CloudLocation): boolean {
  return (
    a.provider === b.provider &&
    a.identifier === b.identifier &&
    a.key === b.key &&
    (a.region ?? null) === (b.region ?? null)
  );
}

/**
 * Group locations by provider, keeping first-seen order and dropping repeats.
 * On-prem entries are ignored: the on-prem slot only ever holds the entry
 * derived from `accessUrl`.
 */
export function createLocationSet(accessUrl: string, locations: readonly CloudLocation[] = []): LocationSet {
  const grouped = new Map<CloudProvider, CloudLocation[]>();
  for (const location of locations) {
    if (location.provider === 'on-prem') continue;
    const list = grouped.get(location.provider) ?? [];
    if (list.some((existing) => sameLocation(existing, location))) continue;
    list.push(Object.freeze({ ...location }));
    grouped.set(location.provider, list);
  }

  const onPrem = onPremLocation(accessUrl);
  const providers = new Map<CloudProvider, readonly CloudLocation[]>();
  for (const [provider, list] of grouped) {
    providers.set(provider, Object.freeze(list));
  }
  providers.set('on-prem', Object.freeze([onPrem]));

  return Object.freeze({ accessUrl, providers, onPrem });
}

export function mergeLocationSets(base: LocationSet, ...others: LocationSet[]): LocationSet {
  return createLocationSet(base.accessUrl, [base, ...others].flatMap(listCloudLocations));
}

function listCloudLocations(set: LocationSet): CloudLocation[] {
  const out: CloudLocation[] = [];
  for (const [provider, list] of set.providers) {
    if (provider !== 'on-prem') out.push(...list);
  }
  return out;
}

/** Every candidate in selection order: cloud providers as described, on-prem last. */
export function listCandidates(set: LocationSet): CloudLocation[] {
  return [...listCloudLocations(set), set.onPrem];
}
