/**
 * Credential fallback chain for a selected location:
 *
 *   open policy / on-prem  -> no credentials, nothing probed
 *   explicit credentials   -> validated, used as-is (no fallback)
 *   named profile          -> looked up, profile-not-found if missing (no fallback)
 *   anonymous              -> recorded as refused by the policy
 *   environment            -> provider-standard variables
 *   otherwise              -> CredentialError(no-credentials-available)
 *
 * No step retries or waits; a failure is final for this call.
 */
import { CredentialError, InvariantViolation, type CredentialAttempt } from '../shared/errors.js';
import { checkCredentialShape } from './validate.js';
import type { AccessPolicy, CloudLocation } from '../location/types.js';
import type { CredentialOverride, CredentialProvider, CredentialSet } from './types.js';

export type CredentialResult =
  | { ok: true; credentials: CredentialSet; attempts: CredentialAttempt[] }
  | { ok: false; error: CredentialError };

const none: CredentialSet = { origin: 'none', values: Object.freeze({}) };
export const NO_CREDENTIALS = Object.freeze(none);

export function resolveCredentials(
  location: CloudLocation,
  policy: AccessPolicy,
  provider: CredentialProvider,
  override?: CredentialOverride,
): CredentialResult {
  if (policy === 'open' || location.provider === 'on-prem') {
    return { ok: true, credentials: NO_CREDENTIALS, attempts: [] };
  }
  if (location.provider === 'other') {
    throw new InvariantViolation(`no credential scheme for unsupported source "${location.source}"`);
  }

  const target = location.provider;
  const attempts: CredentialAttempt[] = [];

  if (override?.credentials) {
    const probe = checkCredentialShape(target, override.credentials);
    if (probe.status !== 'found') {
      attempts.push({ step: 'explicit', outcome: 'malformed', detail: probe.detail });
      return { ok: false, error: new CredentialError('invalid-credentials', attempts, { provider: target }) };
    }
    attempts.push({ step: 'explicit', outcome: 'found' });
    return { ok: true, credentials: freezeSet('explicit', probe.values), attempts };
  }

  if (override?.profile) {
    const profile = override.profile;
    const probe = provider.fromProfile(profile, target);
    switch (probe.status) {
      case 'found':
        attempts.push({ step: 'profile', outcome: 'found', detail: profile });
        return { ok: true, credentials: freezeSet('profile', probe.values, profile), attempts };
      case 'absent':
        attempts.push({ step: 'profile', outcome: 'absent', detail: probe.detail ?? profile });
        return {
          ok: false,
          error: new CredentialError('profile-not-found', attempts, { provider: target, profile }),
        };
      case 'malformed':
        attempts.push({ step: 'profile', outcome: 'malformed', detail: probe.detail });
        return {
          ok: false,
          error: new CredentialError('invalid-credentials', attempts, { provider: target, profile }),
        };
    }
  }

  attempts.push({ step: 'anonymous', outcome: 'not-permitted', detail: `access policy is ${policy}` });

  const env = provider.fromEnvironment(target);
  if (env.status === 'found') {
    attempts.push({ step: 'environment', outcome: 'found', detail: env.detail });
    return { ok: true, credentials: freezeSet('environment', env.values, env.profile), attempts };
  }
  attempts.push({ step: 'environment', outcome: env.status, detail: env.detail });

  return { ok: false, error: new CredentialError('no-credentials-available', attempts, { provider: target }) };
}

function freezeSet(origin: CredentialSet['origin'], values: Record<string, string>, profile?: string): CredentialSet {
  const set: CredentialSet = profile === undefined
    ? { origin, values: Object.freeze({ ...values }) }
    : { origin, values: Object.freeze({ ...values }), profile };
  return Object.freeze(set);
}
