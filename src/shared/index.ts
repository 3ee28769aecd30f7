/**
 * Shared Module Exports
 */

// Types
export * from './types'

// Errors
export * from './errors/ComfyErrors'

// Utils
export * from './utils/timeTokens'

// Constants
export * from './constants/nodeRoles'
export * from './constants/widgetNames'
