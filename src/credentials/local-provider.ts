import { checkCredentialShape } from './validate.js';
import type { FileProfileStore } from './profile-store.js';
import type { CredentialedProvider, CredentialProbe, CredentialProvider } from './types.js';

type Env = Readonly<Record<string, string | undefined>>;

function pick(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Credentials from the provider-standard environment variables plus a local
 * profile store. The env map is captured at construction; nothing reads
 * `process.env` behind the caller's back.
 */
export class LocalCredentialProvider implements CredentialProvider {
  readonly name = 'local';
  private readonly env: Env;
  private readonly profiles: FileProfileStore | null;

  constructor(opts: { env: Env; profileStore?: FileProfileStore | null }) {
    this.env = opts.env;
    this.profiles = opts.profileStore ?? null;
  }

  fromEnvironment(provider: CredentialedProvider): CredentialProbe {
    return provider === 'aws' ? this.awsFromEnvironment() : this.googleFromEnvironment();
  }

  fromProfile(profile: string, provider: CredentialedProvider): CredentialProbe {
    if (!this.profiles) {
      return { status: 'absent', detail: 'no credential profile store configured' };
    }
    return this.profiles.lookup(profile, provider);
  }

  private awsFromEnvironment(): CredentialProbe {
    const accessKeyId = pick(this.env, 'AWS_ACCESS_KEY_ID');
    const secretAccessKey = pick(this.env, 'AWS_SECRET_ACCESS_KEY');
    if (accessKeyId || secretAccessKey) {
      return withDetail(
        checkCredentialShape('aws', {
          accessKeyId,
          secretAccessKey,
          sessionToken: pick(this.env, 'AWS_SESSION_TOKEN'),
        }),
        'AWS_ACCESS_KEY_ID/AWS_SECRET_ACCESS_KEY',
      );
    }

    const roleArn = pick(this.env, 'AWS_ROLE_ARN');
    const webIdentityTokenFile = pick(this.env, 'AWS_WEB_IDENTITY_TOKEN_FILE');
    if (roleArn || webIdentityTokenFile) {
      return withDetail(
        checkCredentialShape('aws', { roleArn, webIdentityTokenFile }),
        'AWS_ROLE_ARN/AWS_WEB_IDENTITY_TOKEN_FILE',
      );
    }

    const profile = pick(this.env, 'AWS_PROFILE');
    if (profile) {
      const probe = this.fromProfile(profile, 'aws');
      return probe.status === 'absent' ? { status: 'malformed', detail: `AWS_PROFILE: ${probe.detail ?? profile}` } : probe;
    }

    return { status: 'absent', detail: 'no AWS credential variables set' };
  }

  private googleFromEnvironment(): CredentialProbe {
    const credentialsFile = pick(this.env, 'GOOGLE_APPLICATION_CREDENTIALS');
    if (credentialsFile) {
      return withDetail(checkCredentialShape('google-cloud', { credentialsFile }), 'GOOGLE_APPLICATION_CREDENTIALS');
    }
    const accessToken = pick(this.env, 'GOOGLE_OAUTH_ACCESS_TOKEN');
    if (accessToken) {
      return withDetail(checkCredentialShape('google-cloud', { accessToken }), 'GOOGLE_OAUTH_ACCESS_TOKEN');
    }
    return { status: 'absent', detail: 'no Google Cloud credential variables set' };
  }
}

function withDetail(probe: CredentialProbe, source: string): CredentialProbe {
  return probe.status === 'found' ? { ...probe, detail: source } : probe;
}
