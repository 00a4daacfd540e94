export type CloudProvider = 'aws' | 'google-cloud' | 'on-prem' | 'other';

/** Providers a handle can actually be built for. */
export type FetchableProvider = Exclude<CloudProvider, 'other'>;

export type AccessPolicy = 'open' | 'restricted' | 'region';

export const ACCESS_POLICIES: readonly AccessPolicy[] = ['open', 'restricted', 'region'];

/** Policy assumed when a descriptor entry carries no `access` key. */
export const DEFAULT_ACCESS_POLICY: AccessPolicy = 'restricted';

export interface CloudLocation {
  readonly provider: CloudProvider;
  /** Descriptor key or source option the entry came from, e.g. `aws`, `gc`, `azure`. */
  readonly source: string;
  /** Bucket name, or the server host for on-prem. */
  readonly identifier: string;
  readonly key: string;
  readonly region?: string;
  readonly accessPolicy: AccessPolicy;
  /** Only set on the on-prem entry: the record's access_url, verbatim. */
  readonly url?: string;
}

/**
 * Normalized candidates for one data product. Every provider maps to a list,
 * ordered by selection priority; on-prem always holds exactly the synthetic entry.
 */
export interface LocationSet {
  readonly accessUrl: string;
  readonly providers: ReadonlyMap<CloudProvider, readonly CloudLocation[]>;
  readonly onPrem: CloudLocation;
}

export type SourceRequest =
  | { kind: 'default' }
  | { kind: 'provider'; provider: Exclude<CloudProvider, 'on-prem'>; name: string; region?: string };

/** Minimal record shape handed over by the catalog query layer. */
export interface DataProductRecord {
  access_url: string;
  cloud_access?: string | null;
}
