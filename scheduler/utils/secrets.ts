/**
 * Named secrets bound into the job's environment.
 *
 * The set of names is fixed; values are opaque and passed through untouched.
 */

export const SECRET_NAMES = [
  'MONGO_URI',
  'EMAIL_FROM',
  'EMAIL_TO',
  'SMTP_SERVER',
  'SMTP_PORT',
  'SMTP_USER',
  'SMTP_PASSWORD',
  'DEPARTMENTS',
] as const

export type SecretName = (typeof SECRET_NAMES)[number]

export type SecretSet = Readonly<Record<SecretName, string>>

export interface SecretProvider {
  getSecret(name: SecretName): Promise<string | undefined>
}

/**
 * Reads secrets from an environment record, by default this process's
 * (populated from the host or from dotenv files by the CLI).
 */
export class EnvSecretProvider implements SecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getSecret(name: SecretName): Promise<string | undefined> {
    return this.env[name]
  }
}

/**
 * Resolve every fixed name once for one invocation. A name the provider does
 * not hold is bound to the empty string, as a hosted runner does for an unset
 * secret.
 */
export async function resolveSecrets(provider: SecretProvider): Promise<SecretSet> {
  const read = async (name: SecretName): Promise<string> => {
    const value = await provider.getSecret(name)
    if (value === undefined) {
      console.warn(`[Secrets] ${name} is not set; binding an empty value`)
      return ''
    }
    return value
  }

  return {
    MONGO_URI: await read('MONGO_URI'),
    EMAIL_FROM: await read('EMAIL_FROM'),
    EMAIL_TO: await read('EMAIL_TO'),
    SMTP_SERVER: await read('SMTP_SERVER'),
    SMTP_PORT: await read('SMTP_PORT'),
    SMTP_USER: await read('SMTP_USER'),
    SMTP_PASSWORD: await read('SMTP_PASSWORD'),
    DEPARTMENTS: await read('DEPARTMENTS'),
  }
}

/**
 * Variables a child process needs to start at all. Everything else in the
 * parent environment stays out of the job.
 */
export const RUNTIME_ENV_ALLOWLIST = [
  'PATH',
  'HOME',
  'USER',
  'SHELL',
  'LANG',
  'LC_ALL',
  'TZ',
  'TMPDIR',
  'NODE_ENV',
  'SYSTEMROOT',
  'APPDATA',
] as const

export function pickRuntimeEnv(parentEnv: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {}
  for (const key of RUNTIME_ENV_ALLOWLIST) {
    const value = parentEnv[key]
    if (value !== undefined) {
      env[key] = value
    }
  }
  return env
}

export function buildJobEnv(secrets: SecretSet, parentEnv: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return { ...pickRuntimeEnv(parentEnv), ...secrets }
}
