import { identityClassifier, publicBucketClassifier, type AccessPolicyClassifier } from '../location/classifier.js';
import { LocalCredentialProvider } from '../credentials/local-provider.js';
import { FileProfileStore } from '../credentials/profile-store.js';
import { getLocatorPaths } from '../workspace/paths.js';
import type { CredentialProvider } from '../credentials/types.js';
import type { ResolverConfig } from '../workspace/types.js';

/** Injected capabilities of a resolution. Shared read-only between calls. */
export interface ResolverContext {
  credentialProvider: CredentialProvider;
  classifier: AccessPolicyClassifier;
}

export function createResolverContext(
  config: Pick<ResolverConfig, 'profileStore' | 'publicBuckets'>,
  env: Readonly<Record<string, string | undefined>> = process.env,
): ResolverContext {
  return {
    credentialProvider: new LocalCredentialProvider({
      env: { ...env },
      profileStore: new FileProfileStore(config.profileStore),
    }),
    classifier: config.publicBuckets.length > 0 ? publicBucketClassifier(config.publicBuckets) : identityClassifier,
  };
}

export function defaultResolverContext(): ResolverContext {
  return createResolverContext({ profileStore: getLocatorPaths().profileStore, publicBuckets: [] });
}
