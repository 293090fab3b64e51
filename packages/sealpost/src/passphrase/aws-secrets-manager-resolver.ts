/**
 * AWS Secrets Manager passphrase resolver.
 *
 * @remarks
 * The secret named by `{Role}AWSSecretsName` holds a JSON object of string
 * values; the passphrase is its `SecretPassPhrase` entry. Suited to
 * serverless, container and EC2 deployments where the process has an IAM
 * role.
 */

import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager'
import { SecretRetrievalError } from '../errors.js'
import { errorMessage } from '../logger.js'
import { SettingKeys, awsSecretsNameKey, optionalSetting } from '../settings.js'
import type { Role, RuntimeSettings } from '../types.js'
import { requireSecretSetting } from './settings.js'
import type { PassphraseResolver, PassphraseResolverDeps, SecretFetcher } from './types.js'

/** Name of the entry holding the passphrase inside the secret blob. */
export const SECRET_PASSPHRASE_FIELD = 'SecretPassPhrase'

/** Options for {@link createAwsSecretFetcher}. */
export interface AwsSecretFetcherOptions {
  /** AWS region; the SDK's default provider chain applies when omitted. */
  region?: string | undefined
  /** Preconfigured client, mainly for tests. */
  client?: SecretsManagerClient | undefined
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Create a {@link SecretFetcher} backed by AWS Secrets Manager.
 */
export function createAwsSecretFetcher(options?: AwsSecretFetcherOptions): SecretFetcher {
  const client =
    options?.client ??
    new SecretsManagerClient(options?.region !== undefined ? { region: options.region } : {})

  return {
    async getSecretString(name: string): Promise<string> {
      const response = await client.send(new GetSecretValueCommand({ SecretId: name }))
      if (response.SecretString !== undefined) {
        return response.SecretString
      }
      if (response.SecretBinary !== undefined) {
        return Buffer.from(response.SecretBinary).toString('utf8')
      }
      throw new Error(`Secret [${name}] has no value`)
    },
  }
}

/**
 * Passphrase resolver for `AWS_SECRETSMANAGER`.
 * @public
 */
export class AwsSecretsManagerResolver implements PassphraseResolver {
  readonly mode = 'AWS_SECRETSMANAGER'
  readonly displayName = 'AWS Secrets Manager'
  readonly #fetcher: SecretFetcher | undefined

  constructor(deps: PassphraseResolverDeps = {}) {
    this.#fetcher = deps.secretFetcher
  }

  async resolve(role: Role, settings: RuntimeSettings): Promise<string> {
    const secretName = requireSecretSetting(settings, awsSecretsNameKey(role), role, this.mode)
    const fetcher =
      this.#fetcher ??
      createAwsSecretFetcher({ region: optionalSetting(settings, SettingKeys.awsRegion) })

    let blob: string
    try {
      blob = await fetcher.getSecretString(secretName)
    } catch (error) {
      throw new SecretRetrievalError(
        `Failed to fetch secret [${secretName}] from AWS Secrets Manager: ${errorMessage(error)}`,
        role,
        this.mode,
        { cause: error },
      )
    }

    return this.#extractPassphrase(blob, secretName, role)
  }

  #extractPassphrase(blob: string, secretName: string, role: Role): string {
    let parsed: unknown
    try {
      parsed = JSON.parse(blob)
    } catch (error) {
      throw new SecretRetrievalError(
        `Secret [${secretName}] is not a JSON object`,
        role,
        this.mode,
        { cause: error },
      )
    }

    if (!isObject(parsed)) {
      throw new SecretRetrievalError(`Secret [${secretName}] is not a JSON object`, role, this.mode)
    }

    const value = Object.hasOwn(parsed, SECRET_PASSPHRASE_FIELD)
      ? parsed[SECRET_PASSPHRASE_FIELD]
      : undefined
    if (typeof value !== 'string') {
      throw new SecretRetrievalError(
        `Failed to retrieve ${SECRET_PASSPHRASE_FIELD} from AWS Secrets Manager secret [${secretName}]`,
        role,
        this.mode,
      )
    }
    return value
  }
}
