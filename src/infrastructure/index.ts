/**
 * Infrastructure Module Exports
 */

// API Layer
export * from './api'

// Storage Layer
export * from './storage/ImageFileStorage'
