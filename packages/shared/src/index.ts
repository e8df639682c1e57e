/**
 * @nowplaying-bridge/shared
 *
 * Hand-written utilities used across the workspace:
 * - logger.ts: scoped, level-filtered console logger
 * - backoff.ts: exponential backoff delay
 */
export * from './logger.js';
export * from './backoff.js';
