/**
 * Field Decoder
 *
 * Translates one raw feed delivery (topic + payload) into a typed instruction
 * for the playback store.
 *
 * Design principles:
 * - Pure: no I/O, no shared state, same input → same result
 * - Table-driven: a topic suffix maps to exactly one decode rule
 * - Total: malformed input becomes an `error` result, never an exception
 *
 * Non-responsibilities:
 * - Applying updates (playback-store.ts handles this)
 * - Transport concerns (feed-subscriber.ts handles this)
 */

import { parsePlayerState, type PlayerState } from '@nowplaying-bridge/protocol';

// ─────────────────────────────────────────────────────────────────────────────
// Instructions
// ─────────────────────────────────────────────────────────────────────────────

/** Text fields of the now-playing record that a topic can set. */
export type TextField = 'title' | 'artist' | 'album' | 'genre' | 'clientName';

/**
 * A decoded, validated update ready to be applied to the store.
 */
export type Instruction =
  | { kind: 'text'; field: TextField; value: string }
  | { kind: 'volume'; value: number }
  | { kind: 'artwork'; bytes: Uint8Array | null }
  | { kind: 'transition'; state: PlayerState }
  | { kind: 'sessionEnd' };

export type IgnoreReason = 'outside-prefix' | 'unknown-topic';

/**
 * Outcome of decoding one delivery.
 */
export type DecodeResult =
  | { status: 'applied'; suffix: string; instruction: Instruction }
  | { status: 'ignored'; topic: string; reason: IgnoreReason }
  | { status: 'error'; suffix: string; message: string };

// ─────────────────────────────────────────────────────────────────────────────
// Topic Table
// ─────────────────────────────────────────────────────────────────────────────

/**
 * How the payload of a known topic is interpreted.
 */
export type DecodeRule =
  | { type: 'text'; field: TextField }
  | { type: 'volume' }
  | { type: 'artwork' }
  | { type: 'stateToken' }
  | { type: 'fixedState'; state: PlayerState }
  | { type: 'sessionEnd' };

/**
 * Topic suffix vocabulary published under the configured prefix.
 * Adding a topic is one entry here (plus a rule variant if the payload is new).
 */
export const TOPIC_RULES: ReadonlyMap<string, DecodeRule> = new Map<string, DecodeRule>([
  ['title', { type: 'text', field: 'title' }],
  ['artist', { type: 'text', field: 'artist' }],
  ['album', { type: 'text', field: 'album' }],
  ['genre', { type: 'text', field: 'genre' }],
  ['client_name', { type: 'text', field: 'clientName' }],
  ['volume', { type: 'volume' }],
  ['cover', { type: 'artwork' }],
  ['artwork', { type: 'artwork' }],
  ['play_state', { type: 'stateToken' }],
  ['play_start', { type: 'fixedState', state: 'playing' }],
  ['play_resume', { type: 'fixedState', state: 'playing' }],
  ['pause', { type: 'fixedState', state: 'paused' }],
  ['play_end', { type: 'sessionEnd' }],
  ['play_flush', { type: 'sessionEnd' }],
  ['active_end', { type: 'sessionEnd' }],
]);

// ─────────────────────────────────────────────────────────────────────────────
// Decoder
// ─────────────────────────────────────────────────────────────────────────────

export interface FieldDecoderOptions {
  /** Topic prefix without trailing slash (e.g. "shairport-sync") */
  topicPrefix: string;
  /** Session-end topics also clear title, artist, album and artwork */
  clearTrackOnSessionEnd?: boolean;
}

export type FieldDecoder = (topic: string, payload: Uint8Array) => DecodeResult;

type RuleOutcome = { instruction: Instruction } | { error: string };

/** Plain decimal number, optional exponent; no hex, no Infinity */
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Creates a decoder bound to a topic prefix.
 * @param options - Prefix and session-end behaviour
 * @returns A pure decode function
 */
export function createFieldDecoder(options: FieldDecoderOptions): FieldDecoder {
  const prefix = `${options.topicPrefix}/`;
  const clearTrackOnSessionEnd = options.clearTrackOnSessionEnd ?? false;

  return (topic, payload) => {
    if (!topic.startsWith(prefix)) {
      return { status: 'ignored', topic, reason: 'outside-prefix' };
    }

    const suffix = topic.slice(prefix.length);
    const rule = TOPIC_RULES.get(suffix);
    if (!rule) {
      return { status: 'ignored', topic, reason: 'unknown-topic' };
    }

    const outcome = applyRule(rule, payload, clearTrackOnSessionEnd);
    if ('error' in outcome) {
      return { status: 'error', suffix, message: outcome.error };
    }
    return { status: 'applied', suffix, instruction: outcome.instruction };
  };
}

/**
 * Interprets a payload according to its topic's rule.
 */
function applyRule(
  rule: DecodeRule,
  payload: Uint8Array,
  clearTrackOnSessionEnd: boolean,
): RuleOutcome {
  switch (rule.type) {
    case 'text': {
      const text = decodeText(payload);
      if (text === null) return { error: 'payload is not valid UTF-8' };
      return { instruction: { kind: 'text', field: rule.field, value: text } };
    }

    case 'volume': {
      const text = decodeText(payload);
      if (text === null) return { error: 'payload is not valid UTF-8' };
      const volume = parseVolume(text);
      if (volume === null) return { error: `invalid volume "${text}"` };
      return { instruction: { kind: 'volume', value: volume } };
    }

    case 'artwork':
      // Copy so the record owns its bytes independently of the transport buffer
      return {
        instruction: {
          kind: 'artwork',
          bytes: payload.length > 0 ? new Uint8Array(payload) : null,
        },
      };

    case 'stateToken': {
      const text = decodeText(payload);
      if (text === null) return { error: 'payload is not valid UTF-8' };
      const state = parsePlayerState(text);
      if (state === null) return { error: `unknown player state "${text}"` };
      return { instruction: { kind: 'transition', state } };
    }

    case 'fixedState':
      return { instruction: { kind: 'transition', state: rule.state } };

    case 'sessionEnd':
      return {
        instruction: clearTrackOnSessionEnd
          ? { kind: 'sessionEnd' }
          : { kind: 'transition', state: 'stopped' },
      };

    default: {
      const unreachable: never = rule;
      return { error: `unsupported rule ${JSON.stringify(unreachable)}` };
    }
  }
}

/**
 * Strict UTF-8 decode. A leading byte-order mark is kept as published.
 * @param payload - Raw bytes
 * @returns The decoded text, or null for invalid UTF-8
 */
function decodeText(payload: Uint8Array): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(payload);
  } catch {
    return null;
  }
}

/**
 * Parses a volume payload.
 * Accepts "-15.5" or the AirPlay quadruple "-24.09,-24.09,-96.30,0.00"
 * (first element is the volume).
 * @param text - Decoded payload
 * @returns The volume, or null if not a finite decimal number
 */
export function parseVolume(text: string): number | null {
  const first = text.split(',')[0]?.trim() ?? '';
  if (!DECIMAL_PATTERN.test(first)) return null;
  const value = Number(first);
  return Number.isFinite(value) ? value : null;
}
