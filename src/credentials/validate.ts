import type { ZodTypeAny } from 'zod';
import { AwsCredentialsSchema, GoogleCredentialsSchema, formatIssues } from '../shared/schemas.js';
import type { CredentialedProvider, CredentialProbe } from './types.js';

const SCHEMAS: Record<CredentialedProvider, ZodTypeAny> = {
  aws: AwsCredentialsSchema,
  'google-cloud': GoogleCredentialsSchema,
};

/** Check that a bag of values has the shape the provider's SDKs expect. */
export function checkCredentialShape(
  provider: CredentialedProvider,
  values: Record<string, string | undefined>,
): CredentialProbe {
  const present: Record<string, string> = {};
  for (const [k, v] of Object.entries(values)) {
    if (v !== undefined && v !== '') present[k] = v;
  }
  const result = SCHEMAS[provider].safeParse(present);
  if (!result.success) {
    return { status: 'malformed', detail: `${provider} credentials: ${formatIssues(result.error)}` };
  }
  return { status: 'found', values: present };
}
