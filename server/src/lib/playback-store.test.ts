/**
 * Unit tests for PlaybackStore.
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PlayerStateSchema } from '@nowplaying-bridge/protocol';
import type { Instruction } from './field-decoder.js';
import { PlaybackStore, type NowPlaying } from './playback-store.js';

const EMPTY: NowPlaying = {
  title: null,
  artist: null,
  album: null,
  genre: null,
  clientName: null,
  artwork: null,
  volume: null,
  playerState: 'stopped',
  isPlaying: false,
  updatedAt: null,
};

describe('PlaybackStore', () => {
  let now: number;
  let store: PlaybackStore;

  beforeEach(() => {
    now = 1000;
    store = new PlaybackStore(() => now);
  });

  it('starts with every field unknown and stopped', () => {
    expect(store.snapshot()).toEqual(EMPTY);
  });

  it('merges updates to different fields', () => {
    store.apply({ kind: 'text', field: 'title', value: 'Song A' });
    store.apply({ kind: 'text', field: 'artist', value: 'Artist B' });
    expect(store.snapshot()).toEqual({
      ...EMPTY,
      title: 'Song A',
      artist: 'Artist B',
      updatedAt: 1000,
    });
  });

  it('keeps the last write per field', () => {
    store.apply({ kind: 'text', field: 'title', value: 'First' });
    store.apply({ kind: 'text', field: 'title', value: 'Second' });
    store.apply({ kind: 'volume', value: -30 });
    store.apply({ kind: 'volume', value: -12.5 });
    expect(store.snapshot().title).toBe('Second');
    expect(store.snapshot().volume).toBe(-12.5);
  });

  it('gives the same result for disjoint fields in any order', () => {
    const updates: Instruction[] = [
      { kind: 'text', field: 'album', value: 'Album C' },
      { kind: 'text', field: 'genre', value: 'Ambient' },
      { kind: 'text', field: 'clientName', value: 'Phone' },
      { kind: 'volume', value: -20 },
      { kind: 'artwork', bytes: new Uint8Array([7, 7]) },
      { kind: 'transition', state: 'paused' },
    ];
    const reversed = new PlaybackStore(() => now);

    updates.forEach((update) => store.apply(update));
    [...updates].reverse().forEach((update) => reversed.apply(update));

    expect(reversed.snapshot()).toEqual(store.snapshot());
  });

  it('only clears a text field through its own empty update', () => {
    store.apply({ kind: 'text', field: 'title', value: 'Song A' });
    store.apply({ kind: 'transition', state: 'stopped' });
    store.apply({ kind: 'artwork', bytes: null });
    expect(store.snapshot().title).toBe('Song A');

    store.apply({ kind: 'text', field: 'title', value: '' });
    expect(store.snapshot().title).toBe('');
  });

  it('derives isPlaying from the player state', () => {
    store.apply({ kind: 'transition', state: 'playing' });
    expect(store.snapshot().isPlaying).toBe(true);

    store.apply({ kind: 'transition', state: 'paused' });
    expect(store.snapshot().isPlaying).toBe(false);
  });

  it('keeps isPlaying consistent for every state', () => {
    for (const state of PlayerStateSchema.options) {
      store.apply({ kind: 'transition', state });
      const snapshot = store.snapshot();
      expect(snapshot.playerState).toBe(state);
      expect(snapshot.isPlaying).toBe(state === 'playing');
    }
  });

  it('replaces artwork wholesale', () => {
    store.apply({ kind: 'artwork', bytes: new Uint8Array([1, 2, 3, 4, 5]) });
    store.apply({ kind: 'artwork', bytes: new Uint8Array([9, 8]) });
    expect(store.snapshot().artwork).toEqual(new Uint8Array([9, 8]));
  });

  it('ends a session by stopping and clearing the track', () => {
    store.apply({ kind: 'text', field: 'title', value: 'Song A' });
    store.apply({ kind: 'text', field: 'artist', value: 'Artist B' });
    store.apply({ kind: 'text', field: 'album', value: 'Album C' });
    store.apply({ kind: 'text', field: 'genre', value: 'Jazz' });
    store.apply({ kind: 'text', field: 'clientName', value: 'Phone' });
    store.apply({ kind: 'volume', value: -10 });
    store.apply({ kind: 'artwork', bytes: new Uint8Array([1]) });
    store.apply({ kind: 'transition', state: 'playing' });

    now = 2000;
    store.apply({ kind: 'sessionEnd' });

    expect(store.snapshot()).toEqual({
      title: '',
      artist: '',
      album: '',
      genre: 'Jazz',
      clientName: 'Phone',
      artwork: null,
      volume: -10,
      playerState: 'stopped',
      isPlaying: false,
      updatedAt: 2000,
    });
  });

  it('never changes a snapshot that was already handed out', () => {
    store.apply({ kind: 'text', field: 'title', value: 'Before' });
    const before = store.snapshot();

    store.apply({ kind: 'text', field: 'title', value: 'After' });
    store.apply({ kind: 'transition', state: 'playing' });

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.title).toBe('Before');
    expect(before.isPlaying).toBe(false);
    expect(store.snapshot().title).toBe('After');
  });

  it('keeps stored artwork out of reach of readers', () => {
    store.apply({ kind: 'artwork', bytes: new Uint8Array([1, 2, 3]) });
    const snapshot = store.snapshot();

    const bytes = snapshot.artwork;
    if (bytes) bytes[0] = 99;

    expect(snapshot.artwork).toEqual(new Uint8Array([1, 2, 3]));
    expect(store.snapshot().artwork).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('returns the same snapshot until the next apply', () => {
    const first = store.snapshot();
    expect(store.snapshot()).toBe(first);
    store.apply({ kind: 'volume', value: 0 });
    expect(store.snapshot()).not.toBe(first);
  });

  it('records the apply time', () => {
    now = 5000;
    store.apply({ kind: 'volume', value: -1 });
    expect(store.snapshot().updatedAt).toBe(5000);
  });

  it('is always alive', () => {
    expect(store.isAlive()).toBe(true);
  });

  describe('listeners', () => {
    it('receives the new and previous snapshots', () => {
      const listener = vi.fn();
      store.subscribe(listener);
      const previous = store.snapshot();

      store.apply({ kind: 'transition', state: 'playing' });

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(store.snapshot(), previous);
    });

    it('stops receiving after unsubscribe', () => {
      const listener = vi.fn();
      const unsubscribe = store.subscribe(listener);
      unsubscribe();

      store.apply({ kind: 'volume', value: 1 });
      expect(listener).not.toHaveBeenCalled();
    });

    it('applies the update even when a listener throws', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      store.subscribe(() => {
        throw new Error('listener failure');
      });

      store.apply({ kind: 'text', field: 'title', value: 'Still applied' });

      expect(store.snapshot().title).toBe('Still applied');
      expect(errorSpy).toHaveBeenCalledTimes(1);
      errorSpy.mockRestore();
    });
  });
});
