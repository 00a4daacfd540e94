export type ResolverErrorCode =
  | 'parse-error'
  | 'credential-error'
  | 'invariant-violation'
  | 'config-error';

export class ResolverError extends Error {
  readonly code: ResolverErrorCode;

  constructor(code: ResolverErrorCode, message: string) {
    super(message);
    this.name = 'ResolverError';
    this.code = code;
  }
}

/**
 * A malformed descriptor or a single malformed entry within one.
 * `provider` and `index` are unset when the whole text failed to parse.
 */
export class ParseError extends ResolverError {
  readonly provider?: string;
  readonly index?: number;

  constructor(message: string, opts: { provider?: string; index?: number } = {}) {
    const where =
      opts.provider === undefined
        ? ''
        : opts.index === undefined
          ? ` [${opts.provider}]`
          : ` [${opts.provider}#${opts.index}]`;
    super('parse-error', `Invalid cloud_access descriptor${where}: ${message}`);
    this.name = 'ParseError';
    this.provider = opts.provider;
    this.index = opts.index;
  }
}

export type CredentialStep = 'explicit' | 'profile' | 'anonymous' | 'environment';

export type CredentialOutcome = 'found' | 'absent' | 'malformed' | 'not-permitted';

export interface CredentialAttempt {
  step: CredentialStep;
  outcome: CredentialOutcome;
  detail?: string;
}

export type CredentialErrorReason =
  | 'profile-not-found'
  | 'no-credentials-available'
  | 'invalid-credentials';

export class CredentialError extends ResolverError {
  readonly reason: CredentialErrorReason;
  readonly attempts: readonly CredentialAttempt[];
  readonly profile?: string;

  constructor(
    reason: CredentialErrorReason,
    attempts: readonly CredentialAttempt[],
    opts: { provider: string; profile?: string },
  ) {
    super('credential-error', describeCredentialFailure(reason, attempts, opts));
    this.name = 'CredentialError';
    this.reason = reason;
    this.attempts = attempts;
    this.profile = opts.profile;
  }
}

function describeCredentialFailure(
  reason: CredentialErrorReason,
  attempts: readonly CredentialAttempt[],
  opts: { provider: string; profile?: string },
): string {
  const tried = attempts
    .map((a) => `${a.step}: ${a.outcome}${a.detail ? ` (${a.detail})` : ''}`)
    .join('; ');
  switch (reason) {
    case 'profile-not-found':
      return `Credential profile "${opts.profile ?? ''}" not found for ${opts.provider}. Tried ${tried}`;
    case 'invalid-credentials':
      return `Credentials for ${opts.provider} are malformed. Tried ${tried}`;
    case 'no-credentials-available':
      return `No credentials available for ${opts.provider}. Tried ${tried}`;
  }
}

/** Internal inconsistency. Thrown, never returned: it marks a defect. */
export class InvariantViolation extends ResolverError {
  constructor(message: string) {
    super('invariant-violation', `Invariant violated: ${message}`);
    this.name = 'InvariantViolation';
  }
}

export class ConfigError extends ResolverError {
  readonly path: string;

  constructor(path: string, message: string) {
    super('config-error', `Invalid config at ${path}: ${message}`);
    this.name = 'ConfigError';
    this.path = path;
  }
}

export type FallbackReason = 'provider-absent' | 'provider-unsupported';

/** Not an error: records that the on-prem location was substituted for the requested source. */
export interface UnsupportedSourceFallback {
  readonly kind: 'unsupported-source-fallback';
  readonly requested: string;
  readonly reason: FallbackReason;
}
