/**
 * Infrastructure - API Layer
 *
 * HTTP communication with the ComfyUI server.
 */

export * from './ComfyExecutionClient';
