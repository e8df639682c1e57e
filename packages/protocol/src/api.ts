import { z } from 'zod';

import { PlayerStateSchema } from './player.js';

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Responses
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Body of `GET /metadata`.
 * Text fields are null until their topic has been seen, and "" once cleared.
 */
export const MetadataResponseSchema = z.object({
  title: z.string().nullable(),
  artist: z.string().nullable(),
  album: z.string().nullable(),
  genre: z.string().nullable(),
  /** Cover art bytes, base64 encoded */
  artwork_base64: z.string().nullable(),
  is_playing: z.boolean(),
  player_state: PlayerStateSchema,
  volume: z.number().nullable(),
  client_name: z.string().nullable(),
});
export type MetadataResponse = z.infer<typeof MetadataResponseSchema>;

/**
 * Body of `GET /health`.
 */
export const HealthResponseSchema = z.object({
  status: z.literal('ok'),
});
export type HealthResponse = z.infer<typeof HealthResponseSchema>;

/**
 * Feed connection counters exposed on `GET /diagnostics`.
 */
export const FeedDiagnosticsSchema = z.object({
  connected: z.boolean(),
  broker: z.string(),
  topicFilter: z.string(),
  messagesReceived: z.number().int().nonnegative(),
  messagesApplied: z.number().int().nonnegative(),
  messagesIgnored: z.number().int().nonnegative(),
  decodeErrors: z.number().int().nonnegative(),
  reconnectAttempts: z.number().int().nonnegative(),
  /** Epoch ms of the last delivery, null before the first one */
  lastMessageAt: z.number().nullable(),
});
export type FeedDiagnostics = z.infer<typeof FeedDiagnosticsSchema>;

/**
 * Body of `GET /diagnostics`.
 */
export const DiagnosticsResponseSchema = z.object({
  feed: FeedDiagnosticsSchema,
  player_state: PlayerStateSchema,
  /** Epoch ms of the last applied update, null before the first one */
  updated_at: z.number().nullable(),
});
export type DiagnosticsResponse = z.infer<typeof DiagnosticsResponseSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export const ErrorCodeSchema = z.enum(['not_found', 'method_not_allowed', 'internal_error']);
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

export const ApiErrorResponseSchema = z.object({
  error: ErrorCodeSchema,
  message: z.string(),
});
export type ApiErrorResponse = z.infer<typeof ApiErrorResponseSchema>;
