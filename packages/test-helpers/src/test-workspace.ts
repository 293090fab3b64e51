/**
 * Pre-configured sealpost workflow for consumer tests.
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { CryptoWorkflow, SettingKeys, awsSecretsNameKey } from 'sealpost'
import type { CryptoWorkflowOptions, KeyRecord, RuntimeSettings } from 'sealpost'
import { InMemoryEngine } from './in-memory-engine.js'
import { InMemorySecretFetcher } from './in-memory-secret-fetcher.js'

/**
 * Options for creating a {@link TestWorkspace}.
 * @public
 */
export interface TestWorkspaceOptions {
  /** Sender email. Defaults to `alice@home.internal`. */
  sender?: string | undefined
  /** Recipient email. Defaults to `bob@home.internal`. */
  recipient?: string | undefined
  /** Defaults to `test-secret-sender`. */
  senderPassphrase?: string | undefined
  /** Defaults to `test-secret-recipient`. */
  recipientPassphrase?: string | undefined
}

/**
 * Temporary folders, an in-memory keystore holding a sender and a recipient
 * key, and settings that resolve both passphrases from an in-memory secrets
 * service.
 *
 * @example
 * ```ts
 * const workspace = await TestWorkspace.create()
 * const workflow = workspace.createWorkflow()
 * await workflow.init()
 * const source = await workspace.writeSource('report.csv', 'a,b\n')
 * ```
 *
 * @public
 */
export class TestWorkspace {
  /** Root temporary directory; removed by {@link TestWorkspace.cleanup}. */
  readonly root: string
  readonly sourceFolder: string
  readonly destinationFolder: string
  readonly archiveFolder: string
  readonly engine: InMemoryEngine
  readonly secrets: InMemorySecretFetcher
  readonly senderKey: KeyRecord
  readonly recipientKey: KeyRecord
  readonly settings: RuntimeSettings

  private constructor(root: string, options: TestWorkspaceOptions) {
    const sender = options.sender ?? 'alice@home.internal'
    const recipient = options.recipient ?? 'bob@home.internal'
    const senderPassphrase = options.senderPassphrase ?? 'test-secret-sender'
    const recipientPassphrase = options.recipientPassphrase ?? 'test-secret-recipient'

    this.root = root
    this.sourceFolder = path.join(root, 'source')
    this.destinationFolder = path.join(root, 'destination')
    this.archiveFolder = path.join(root, 'archive')

    this.engine = new InMemoryEngine()
    this.senderKey = this.engine.addKey({ email: sender, passphrase: senderPassphrase })
    this.recipientKey = this.engine.addKey({ email: recipient, passphrase: recipientPassphrase })

    this.secrets = new InMemorySecretFetcher()
    this.secrets.storePassphrase('sealpost/test/sender', senderPassphrase)
    this.secrets.storePassphrase('sealpost/test/recipient', recipientPassphrase)

    this.settings = Object.freeze({
      [SettingKeys.senderEmail]: sender,
      [SettingKeys.recipientEmail]: recipient,
      [SettingKeys.passphraseProtectionMode]: 'AWS_SECRETSMANAGER',
      [awsSecretsNameKey('Sender')]: 'sealpost/test/sender',
      [awsSecretsNameKey('Recipient')]: 'sealpost/test/recipient',
      [SettingKeys.sourceFolder]: this.sourceFolder,
      [SettingKeys.destinationFolder]: this.destinationFolder,
      [SettingKeys.archiveFolder]: this.archiveFolder,
    })
  }

  /**
   * Create the temporary folders and the keystore.
   * @public
   */
  static async create(options: TestWorkspaceOptions = {}): Promise<TestWorkspace> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'sealpost-test-'))
    const workspace = new TestWorkspace(root, options)
    await Promise.all(
      [workspace.sourceFolder, workspace.destinationFolder, workspace.archiveFolder].map((dir) =>
        fs.mkdir(dir, { recursive: true }),
      ),
    )
    return workspace
  }

  /**
   * Create a workflow over this workspace's engine and secrets.
   * `settings` entries override the workspace settings.
   * @public
   */
  createWorkflow(
    settings: Record<string, string> = {},
    options: Partial<Omit<CryptoWorkflowOptions, 'settings'>> = {},
  ): CryptoWorkflow {
    return new CryptoWorkflow({
      engine: this.engine,
      passphraseDeps: { secretFetcher: this.secrets },
      ...options,
      settings: { ...this.settings, ...settings },
    })
  }

  /** Write a file into the source folder and return its path. */
  async writeSource(name: string, content: string): Promise<string> {
    const filePath = path.join(this.sourceFolder, name)
    await fs.writeFile(filePath, content)
    return filePath
  }

  /**
   * Remove the temporary folders.
   * @public
   */
  async cleanup(): Promise<void> {
    await fs.rm(this.root, { recursive: true, force: true })
  }
}
