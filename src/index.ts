export { resolve, resolveBatch, resolveLocations, type ResolveResult } from './resolver/index.js';
export { buildFetchHandle, type FetchHandle } from './resolver/handle.js';
export { createResolverContext, defaultResolverContext, type ResolverContext } from './resolver/context.js';
export { parseCloudAccess, type ParseResult } from './location/parser.js';
export { locationsFromSourceRows, splitObjectUri, type SourceOption, type SourceRow } from './location/datalink.js';
export { locationsFromRefColumns, type RefColumn } from './location/ucd.js';
export { parseSourceRequest, selectLocation, type Selection } from './location/selector.js';
export { createLocationSet, listCandidates, mergeLocationSets } from './location/set.js';
export {
  identityClassifier,
  publicBucketClassifier,
  type AccessPolicyClassifier,
} from './location/classifier.js';
export { resolveCredentials, type CredentialResult } from './credentials/resolver.js';
export { LocalCredentialProvider } from './credentials/local-provider.js';
export { FileProfileStore } from './credentials/profile-store.js';
export { loadConfig } from './workspace/config.js';
export {
  ConfigError,
  CredentialError,
  InvariantViolation,
  ParseError,
  ResolverError,
  type CredentialAttempt,
  type UnsupportedSourceFallback,
} from './shared/errors.js';
export type {
  AccessPolicy,
  CloudLocation,
  CloudProvider,
  DataProductRecord,
  LocationSet,
  SourceRequest,
} from './location/types.js';
export type { CredentialOverride, CredentialProvider, CredentialSet } from './credentials/types.js';
export type { ResolverConfig } from './workspace/types.js';
