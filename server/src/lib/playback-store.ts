/**
 * Playback State Store
 *
 * Owns the single "now playing" record.
 *
 * Responsibilities:
 * - Apply decoded instructions in arrival order
 * - Serve immutable snapshots to any number of readers
 * - Report liveness independently of feed health
 *
 * Every apply builds a new frozen record and swaps the reference, so a reader
 * holding a snapshot never sees it change and never sees a half-applied update.
 */

import { isPlayingState, type PlayerState } from '@nowplaying-bridge/protocol';
import { createLogger } from '@nowplaying-bridge/shared';
import type { Instruction } from './field-decoder.js';

const log = createLogger('PlaybackStore');

/**
 * Point-in-time view of the current playback session.
 * Text fields: null = never seen, "" = explicitly cleared.
 */
export interface NowPlaying {
  readonly title: string | null;
  readonly artist: string | null;
  readonly album: string | null;
  readonly genre: string | null;
  readonly clientName: string | null;
  readonly artwork: Uint8Array | null;
  readonly volume: number | null;
  readonly playerState: PlayerState;
  /** Derived from playerState; never set on its own */
  readonly isPlaying: boolean;
  /** Epoch ms of the last applied instruction */
  readonly updatedAt: number | null;
}

/** Stored fields: everything except the derived flag. */
type PlaybackRecord = Omit<NowPlaying, 'isPlaying'>;

export type PlaybackListener = (current: NowPlaying, previous: NowPlaying) => void;

const INITIAL_RECORD: PlaybackRecord = {
  title: null,
  artist: null,
  album: null,
  genre: null,
  clientName: null,
  artwork: null,
  volume: null,
  playerState: 'stopped',
  updatedAt: null,
};

/**
 * Builds the frozen snapshot for a record.
 * Artwork is read through a getter returning a fresh copy, so the stored bytes
 * never leave the record.
 * @param record - Stored fields
 * @returns The record with `isPlaying` derived from `playerState`
 */
function toSnapshot(record: PlaybackRecord): NowPlaying {
  const { artwork, ...fields } = record;
  return Object.freeze({
    ...fields,
    get artwork() {
      return artwork ? new Uint8Array(artwork) : null;
    },
    isPlaying: isPlayingState(record.playerState),
  });
}

/**
 * Computes the next record for an instruction.
 * @param record - Current stored fields
 * @param instruction - Decoded update
 * @param now - Timestamp for `updatedAt`
 * @returns The next stored fields
 */
function reduce(record: PlaybackRecord, instruction: Instruction, now: number): PlaybackRecord {
  switch (instruction.kind) {
    case 'text':
      return { ...record, [instruction.field]: instruction.value, updatedAt: now };

    case 'volume':
      return { ...record, volume: instruction.value, updatedAt: now };

    case 'artwork':
      return { ...record, artwork: instruction.bytes, updatedAt: now };

    case 'transition':
      return { ...record, playerState: instruction.state, updatedAt: now };

    case 'sessionEnd':
      return {
        ...record,
        playerState: 'stopped',
        title: '',
        artist: '',
        album: '',
        artwork: null,
        updatedAt: now,
      };
  }
}

export class PlaybackStore {
  private record: PlaybackRecord = INITIAL_RECORD;
  private current: NowPlaying = toSnapshot(INITIAL_RECORD);
  private listeners: Set<PlaybackListener> = new Set();
  private readonly clock: () => number;

  /**
   * @param clock - Time source for `updatedAt` (defaults to Date.now)
   */
  constructor(clock: () => number = Date.now) {
    this.clock = clock;
  }

  /**
   * Applies one decoded instruction and swaps in the new record.
   * @param instruction - The decoded update
   */
  apply(instruction: Instruction): void {
    const previous = this.current;
    this.record = reduce(this.record, instruction, this.clock());
    this.current = toSnapshot(this.record);

    for (const listener of this.listeners) {
      try {
        listener(this.current, previous);
      } catch (err) {
        log.error('Listener failed:', err);
      }
    }
  }

  /**
   * Gets the current record.
   * The returned object is frozen and is never modified afterwards; each read
   * of `artwork` yields a new copy.
   */
  snapshot(): NowPlaying {
    return this.current;
  }

  /**
   * Liveness probe. The store has no external dependencies, so it is
   * alive for as long as the process is.
   */
  isAlive(): boolean {
    return true;
  }

  /**
   * Registers a listener called after every apply.
   * @param listener - Receives the new and previous snapshots
   * @returns Unsubscribe function
   */
  subscribe(listener: PlaybackListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
