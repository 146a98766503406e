import { describe, expect, it } from 'vitest';
import {
  getBasename,
  isListableVideo,
  normalizeExtensions,
  sanitizeFilename,
} from './path.js';

describe('sanitizeFilename', () => {
  it('keeps letters, digits and -_. untouched', () => {
    expect(sanitizeFilename('jump_shot-2.v1')).toBe('jump_shot-2.v1');
  });

  it('replaces other characters with underscores', () => {
    expect(sanitizeFilename('lay up/left')).toBe('lay_up_left');
  });

  it('strips leading and trailing dots and underscores', () => {
    expect(sanitizeFilename('..hidden label_')).toBe('hidden_label');
  });

  it('falls back when nothing survives', () => {
    expect(sanitizeFilename('???')).toBe('clip');
    expect(sanitizeFilename('', 'unknown')).toBe('unknown');
  });

  it('keeps non-ascii letters', () => {
    expect(sanitizeFilename('café')).toBe('café');
  });
});

describe('isListableVideo', () => {
  it('accepts known video extensions regardless of case', () => {
    expect(isListableVideo('match.MP4')).toBe(true);
    expect(isListableVideo('match.m4v')).toBe(true);
  });

  it('rejects dotfiles, AppleDouble forks and OS metadata', () => {
    expect(isListableVideo('.match.mp4')).toBe(false);
    expect(isListableVideo('._match.mp4')).toBe(false);
    expect(isListableVideo('Thumbs.db')).toBe(false);
  });

  it('rejects backups and other extensions', () => {
    expect(isListableVideo('match.mp4.bak')).toBe(false);
    expect(isListableVideo('match.avi')).toBe(false);
    expect(isListableVideo('match.avi', ['.avi'])).toBe(true);
  });
});

describe('normalizeExtensions', () => {
  it('adds dots, lowercases and drops blanks and duplicates', () => {
    expect(normalizeExtensions(['mp4', ' .MOV', '', '.mp4'])).toEqual(['.mp4', '.mov']);
  });
});

describe('getBasename', () => {
  it('drops only the last extension', () => {
    expect(getBasename('/videos/game.final.mp4')).toBe('game.final');
  });
});
