import { describe, it, expect } from 'vitest';
import { generateSeed } from '../../src/utils/crypto.js';

describe('generateSeed', () => {
  it('should return a 64-character hex string', () => {
    const seed = generateSeed('Weeknights', '2026-01-01T00:00:00.000Z');
    expect(seed).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should be deterministic for the same inputs', () => {
    const a = generateSeed('Weeknights', '2026-01-01T00:00:00.000Z');
    const b = generateSeed('Weeknights', '2026-01-01T00:00:00.000Z');
    expect(a).toBe(b);
  });

  it('should ignore playlist name case', () => {
    const a = generateSeed('Weeknights', '2026-01-01T00:00:00.000Z');
    const b = generateSeed('WEEKNIGHTS', '2026-01-01T00:00:00.000Z');
    expect(a).toBe(b);
  });

  it('should differ between generation times', () => {
    const a = generateSeed('Weeknights', '2026-01-01T00:00:00.000Z');
    const b = generateSeed('Weeknights', '2026-01-01T00:00:01.000Z');
    expect(a).not.toBe(b);
  });
});
