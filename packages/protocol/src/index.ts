/**
 * @nowplaying-bridge/protocol
 *
 * Wire types shared by the server and its consumers:
 * - player.ts: player state vocabulary and the derived "is playing" flag
 * - api.ts: HTTP response bodies
 */
export * from './player.js';
export * from './api.js';
