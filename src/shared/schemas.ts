import { z } from 'zod';

/** One entry of a `cloud_access` descriptor. Extra keys are ignored. */
export const LocationObjectSchema = z.object({
  bucket_name: z.string().min(1, 'bucket_name must be a non-empty string'),
  key: z.string().min(1, 'key must be a non-empty string'),
  region: z.string().nullish(),
  access: z.enum(['open', 'restricted', 'region']).optional(),
});

export type LocationObject = z.infer<typeof LocationObjectSchema>;

export const AwsCredentialsSchema = z.union([
  z.object({
    accessKeyId: z.string().min(1),
    secretAccessKey: z.string().min(1),
    sessionToken: z.string().min(1).optional(),
  }),
  z.object({
    roleArn: z.string().regex(/^arn:aws[a-z-]*:iam::\d{12}:role\/.+$/, 'roleArn must be an IAM role ARN'),
    webIdentityTokenFile: z.string().min(1),
  }),
]);

export const GoogleCredentialsSchema = z.union([
  z.object({ credentialsFile: z.string().min(1) }),
  z.object({ accessToken: z.string().min(1) }),
]);

export const ProfileStoreSchema = z.object({
  profiles: z
    .record(
      z.string(),
      z.object({
        aws: z.record(z.string(), z.string()).optional(),
        'google-cloud': z.record(z.string(), z.string()).optional(),
      }),
    )
    .default({}),
});

export type ProfileStoreFile = z.infer<typeof ProfileStoreSchema>;

export const ResolverConfigSchema = z.object({
  default_source: z.string().min(1).default('default'),
  profile_store: z.string().min(1).optional(),
  public_buckets: z.array(z.string().min(1)).default([]),
  log_level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type ResolverConfigFile = z.infer<typeof ResolverConfigSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** A record as written to disk by a catalog export; cloud_access may be embedded JSON. */
export const DataProductRecordSchema = z.object({
  access_url: z.string().min(1),
  cloud_access: z.union([z.string(), z.record(z.string(), z.unknown())]).nullable().optional(),
});

export const RecordFileSchema = z.union([DataProductRecordSchema, z.array(DataProductRecordSchema).min(1)]);
