/**
 * In-memory secrets service for testing.
 */

import type { SecretFetcher } from 'sealpost'
import { SECRET_PASSPHRASE_FIELD } from 'sealpost'

/**
 * A fully in-memory `SecretFetcher` standing in for AWS Secrets Manager.
 *
 * @remarks
 * Secrets are kept in a plain `Map`. Every lookup is recorded in
 * {@link InMemorySecretFetcher.requests}, so tests can assert how often and
 * with which name the service was called.
 *
 * @public
 */
export class InMemorySecretFetcher implements SecretFetcher {
  readonly #store = new Map<string, string>()
  readonly #requests: string[] = []

  /** Names passed to {@link InMemorySecretFetcher.getSecretString}, in order. */
  get requests(): readonly string[] {
    return this.#requests
  }

  /** Store a raw secret string. */
  store(name: string, secret: string): void {
    this.#store.set(name, secret)
  }

  /**
   * Store a secret in the shape the passphrase resolver expects:
   * `{"SecretPassPhrase": passphrase}`.
   */
  storePassphrase(name: string, passphrase: string): void {
    this.store(name, JSON.stringify({ [SECRET_PASSPHRASE_FIELD]: passphrase }))
  }

  getSecretString(name: string): Promise<string> {
    this.#requests.push(name)
    const value = this.#store.get(name)
    if (value === undefined) {
      return Promise.reject(new Error(`Secret not found: ${name}`))
    }
    return Promise.resolve(value)
  }

  /** Remove all secrets and forget recorded requests. */
  clear(): void {
    this.#store.clear()
    this.#requests.length = 0
  }

  /** The number of secrets currently stored. */
  get size(): number {
    return this.#store.size
  }
}
