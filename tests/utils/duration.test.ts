import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ITEM_DURATION_SECS,
  durationSecsOf,
  formatPosition,
  formatRuntime,
  ticksToSecs,
} from '../../src/utils/duration.js';

describe('duration utilities', () => {
  describe('durationSecsOf', () => {
    it('should return the item duration when positive', () => {
      expect(durationSecsOf({ durationSeconds: 1320 })).toBe(1320);
    });

    it('should default to 30 seconds when unknown', () => {
      expect(DEFAULT_ITEM_DURATION_SECS).toBe(30);
      expect(durationSecsOf({ durationSeconds: null })).toBe(30);
    });

    it('should default to 30 seconds for zero or negative durations', () => {
      expect(durationSecsOf({ durationSeconds: 0 })).toBe(30);
      expect(durationSecsOf({ durationSeconds: -5 })).toBe(30);
    });

    it('should default to 30 seconds for non-finite durations', () => {
      expect(durationSecsOf({ durationSeconds: Number.NaN })).toBe(30);
    });
  });

  describe('ticksToSecs', () => {
    it('should convert 100ns ticks to seconds', () => {
      expect(ticksToSecs(13_200_000_000)).toBe(1320);
      expect(ticksToSecs(150_000_000)).toBe(15);
    });

    it('should return null for missing or non-positive ticks', () => {
      expect(ticksToSecs(undefined)).toBeNull();
      expect(ticksToSecs(null)).toBeNull();
      expect(ticksToSecs(0)).toBeNull();
    });
  });

  describe('formatRuntime', () => {
    it('should format hours and minutes', () => {
      expect(formatRuntime(7500)).toBe('2h 5m');
    });

    it('should format minutes only under an hour', () => {
      expect(formatRuntime(2700)).toBe('45m');
      expect(formatRuntime(59)).toBe('0m');
    });

    it('should show zero minutes on the hour', () => {
      expect(formatRuntime(3600)).toBe('1h 0m');
    });
  });

  describe('formatPosition', () => {
    it('should zero-pad season and episode', () => {
      expect(formatPosition(1, 4)).toBe('S01E04');
      expect(formatPosition(12, 103)).toBe('S12E103');
    });
  });
});
