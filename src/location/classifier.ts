import type { AccessPolicy, CloudLocation } from './types.js';

/**
 * Decides the access policy of a selected location. Kept separate from
 * parsing so policy inference can change without touching the descriptor format.
 */
export interface AccessPolicyClassifier {
  classify(location: CloudLocation): AccessPolicy;
}

export const identityClassifier: AccessPolicyClassifier = {
  classify: (location) => location.accessPolicy,
};

/** Reports `open` for buckets known to allow anonymous reads; identity otherwise. */
export function publicBucketClassifier(buckets: Iterable<string>): AccessPolicyClassifier {
  const known = new Set(buckets);
  return {
    classify(location) {
      if (location.provider !== 'on-prem' && known.has(location.identifier)) return 'open';
      return location.accessPolicy;
    },
  };
}
