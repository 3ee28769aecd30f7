/**
 * Shared Type Definitions
 */

export * from './comfy/IComfyAPI'
export * from './app/IComfyJson'
export * from './app/IGeneration'
