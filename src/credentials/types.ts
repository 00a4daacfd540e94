import type { FetchableProvider } from '../location/types.js';

/** Providers whose locations can require credentials. */
export type CredentialedProvider = Exclude<FetchableProvider, 'on-prem'>;

export type CredentialOrigin = 'none' | 'environment' | 'profile' | 'explicit';

export interface CredentialSet {
  readonly origin: CredentialOrigin;
  /** Provider-specific auth material, e.g. `accessKeyId`/`secretAccessKey` for aws. */
  readonly values: Readonly<Record<string, string>>;
  readonly profile?: string;
}

export type CredentialProbe =
  | { status: 'found'; values: Record<string, string>; profile?: string; detail?: string }
  | { status: 'absent'; detail?: string }
  | { status: 'malformed'; detail: string };

/**
 * Where credential material comes from. The process environment and the
 * local profile store sit behind this seam so tests can swap in a fake.
 */
export interface CredentialProvider {
  readonly name: string;
  fromEnvironment(provider: CredentialedProvider): CredentialProbe;
  fromProfile(profile: string, provider: CredentialedProvider): CredentialProbe;
}

export interface CredentialOverride {
  profile?: string;
  credentials?: Record<string, string>;
}

export interface ProfileStoreStatus {
  healthy: boolean;
  path: string;
  profiles: number;
  message?: string;
}
