/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './common'
export * from './config'
export * from './providers'
export * from './registry'
export * from './sync'
