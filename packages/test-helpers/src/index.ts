/**
 * @sealpost/test-helpers: test utilities for sealpost consumers.
 *
 * @packageDocumentation
 */

export { InMemoryEngine, TEST_MESSAGE_TYPE } from './in-memory-engine.js'
export type { TestKeyOptions, CreateMessageOptions } from './in-memory-engine.js'
export { InMemorySecretFetcher } from './in-memory-secret-fetcher.js'
export { TestWorkspace } from './test-workspace.js'
export type { TestWorkspaceOptions } from './test-workspace.js'
