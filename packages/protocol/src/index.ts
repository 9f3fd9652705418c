export type * from './shared-types.js'
export type * from './tool-commands.js'
