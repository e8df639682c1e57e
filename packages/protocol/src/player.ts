import { z } from 'zod';

/**
 * Player states reported for the current playback session.
 * - `stopped`: nothing is playing (initial state)
 * - `loading`: the source is preparing playback
 * - `playing`: audio is being rendered
 * - `paused`: playback is suspended and can resume
 */
export const PlayerStateSchema = z.enum(['stopped', 'loading', 'playing', 'paused']);
export type PlayerState = z.infer<typeof PlayerStateSchema>;

/**
 * User-friendly player state labels for log and UI display.
 */
export const PLAYER_STATE_LABELS: Record<PlayerState, string> = {
  stopped: 'Stopped',
  loading: 'Loading',
  playing: 'Playing',
  paused: 'Paused',
} as const;

/**
 * Whether a player state counts as "playing".
 * This is the only place the derived flag is computed.
 * @param state - The player state
 * @returns True only for `playing`
 */
export function isPlayingState(state: PlayerState): boolean {
  return state === 'playing';
}

/**
 * Parses a player state token, ignoring surrounding whitespace and case.
 * @param token - The raw token (e.g. "Playing", " paused")
 * @returns The PlayerState or null if the token is not in the vocabulary
 */
export function parsePlayerState(token: string): PlayerState | null {
  const result = PlayerStateSchema.safeParse(token.trim().toLowerCase());
  return result.success ? result.data : null;
}
