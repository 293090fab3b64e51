export { KeyDirectory } from './directory.js'
export type { RoleKeys } from './directory.js'
