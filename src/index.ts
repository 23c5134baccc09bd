/**
 * hookstage - Main module exports
 * Public API surface for embedding hook orchestration in a deployment tool
 */

// Core types
export * from './core/types.js'

// Core errors
export * from './core/errors.js'

// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { HookstageEvents, HookRef, EventError } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Hook recognition, phase registry and HookSet assembly
export * from './modules/hooks/index.js'

// Readiness evaluation
export * from './modules/readiness/index.js'

// Apply mechanisms
export * from './modules/apply/index.js'

// Phase execution
export * from './modules/phase-executor/index.js'

// Release operations
export * from './modules/lifecycle/index.js'

// Rendered manifest loading
export * from './modules/manifest-loader/index.js'

// Configuration
export * from './modules/config/index.js'
