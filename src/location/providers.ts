import type { CloudProvider } from './types.js';

const PROVIDER_ALIASES: ReadonlyMap<string, CloudProvider> = new Map<string, CloudProvider>([
  ['aws', 'aws'],
  ['s3', 'aws'],
  ['amazon', 'aws'],
  ['gc', 'google-cloud'],
  ['gcp', 'google-cloud'],
  ['gs', 'google-cloud'],
  ['google', 'google-cloud'],
  ['google-cloud', 'google-cloud'],
  ['default', 'on-prem'],
  ['prem', 'on-prem'],
  ['on-prem', 'on-prem'],
  ['main-server', 'on-prem'],
]);

/**
 * Map a descriptor key or source token to a provider tag. Names this
 * resolver does not know become `other`.
 */
export function normalizeProviderName(name: string): CloudProvider {
  return PROVIDER_ALIASES.get(name.trim().toLowerCase()) ?? 'other';
}

/** URI scheme each fetchable cloud provider is addressed with. */
export const PROVIDER_SCHEMES = {
  aws: 's3',
  'google-cloud': 'gs',
} as const;
