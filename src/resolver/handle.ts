import { InvariantViolation } from '../shared/errors.js';
import { PROVIDER_SCHEMES } from '../location/providers.js';
import { urlScheme } from '../location/set.js';
import type { AccessPolicy, CloudLocation, FetchableProvider } from '../location/types.js';
import type { CredentialSet } from '../credentials/types.js';

export interface FetchHandle {
  readonly scheme: string;
  readonly uri: string;
  readonly accessPolicy: AccessPolicy;
  /** null when the location needs no credentials. */
  readonly credentials: CredentialSet | null;
  readonly originProvider: FetchableProvider;
  readonly region?: string;
  /**
   * Always false for `region` policies: the caller's execution region is never
   * checked. The transfer layer decides whether to warn or refuse.
   */
  readonly regionVerified?: false;
}

/**
 * Assemble the immutable handle for an already selected and authorized
 * location. Inputs that break the location invariants are defects, not user
 * errors, and throw InvariantViolation.
 */
export function buildFetchHandle(location: CloudLocation, credentials: CredentialSet): FetchHandle {
  const provider = location.provider;
  const creds = credentials.origin === 'none' ? null : credentials;
  const regionTag = location.accessPolicy === 'region' ? { regionVerified: false as const } : {};

  if (provider === 'on-prem') {
    if (location.url === undefined) {
      throw new InvariantViolation('on-prem location without an access_url');
    }
    const handle: FetchHandle = {
      scheme: urlScheme(location.url) ?? 'https',
      uri: location.url,
      accessPolicy: location.accessPolicy,
      credentials: creds,
      originProvider: provider,
      ...regionTag,
    };
    return Object.freeze(handle);
  }

  if (provider === 'other') {
    throw new InvariantViolation(`no fetch scheme for unsupported source "${location.source}"`);
  }
  if (location.identifier === '' || location.key === '') {
    throw new InvariantViolation(`${provider} location needs both a bucket and a key`);
  }

  const scheme = PROVIDER_SCHEMES[provider];
  const handle: FetchHandle = {
    scheme,
    uri: `${scheme}://${location.identifier}/${location.key}`,
    accessPolicy: location.accessPolicy,
    credentials: creds,
    originProvider: provider,
    ...(location.region === undefined ? {} : { region: location.region }),
    ...regionTag,
  };
  return Object.freeze(handle);
}
