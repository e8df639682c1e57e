import { describe, it, expect } from 'vitest';
import { MetadataResponseSchema } from './api.js';
import { PlayerStateSchema, isPlayingState, parsePlayerState } from './player.js';

describe('parsePlayerState', () => {
  it('accepts tokens regardless of case and whitespace', () => {
    expect(parsePlayerState('playing')).toBe('playing');
    expect(parsePlayerState(' Paused\n')).toBe('paused');
    expect(parsePlayerState('STOPPED')).toBe('stopped');
  });

  it('returns null for tokens outside the vocabulary', () => {
    expect(parsePlayerState('')).toBeNull();
    expect(parsePlayerState('rewinding')).toBeNull();
  });
});

describe('isPlayingState', () => {
  it('is true only for playing', () => {
    expect(PlayerStateSchema.options.filter(isPlayingState)).toEqual(['playing']);
  });
});

describe('MetadataResponseSchema', () => {
  const body = {
    title: 'Song A',
    artist: null,
    album: null,
    genre: null,
    artwork_base64: null,
    is_playing: true,
    player_state: 'playing',
    volume: -15.5,
    client_name: null,
  };

  it('accepts a well-formed body', () => {
    expect(MetadataResponseSchema.safeParse(body).success).toBe(true);
  });

  it('rejects a display label as the player state', () => {
    expect(MetadataResponseSchema.safeParse({ ...body, player_state: 'Playing' }).success).toBe(
      false,
    );
  });
});
