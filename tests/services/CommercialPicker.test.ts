import { describe, it, expect } from 'vitest';
import seedrandom from 'seedrandom';
import { pickSingleCommercial } from '../../src/services/CommercialPicker.js';
import { fakeCommercial } from '../helpers/setup.js';

function pool(size: number) {
  return Array.from({ length: size }, (_, i) => fakeCommercial(`ad-${i}`, 30));
}

describe('pickSingleCommercial', () => {
  it('should return no clip for an empty pool', () => {
    const history: number[] = [];
    const pick = pickSingleCommercial([], history, 50, seedrandom('test-seed'));

    expect(pick).toEqual({ clip: null, durationSecs: 0 });
    expect(history).toEqual([]);
  });

  it('should never repeat a clip within the no-repeat window', () => {
    const clips = pool(60);
    const history: number[] = [];
    const rng = seedrandom('test-seed');

    const picks: string[] = [];
    for (let i = 0; i < 100; i++) {
      const { clip } = pickSingleCommercial(clips, history, 50, rng);
      picks.push(clip?.id ?? 'none');
    }

    for (let start = 0; start + 50 <= picks.length; start++) {
      const window = picks.slice(start, start + 50);
      expect(new Set(window).size).toBe(50);
    }
  });

  it('should keep the history at minGap entries', () => {
    const clips = pool(60);
    const history: number[] = [];
    const rng = seedrandom('test-seed');
    for (let i = 0; i < 100; i++) pickSingleCommercial(clips, history, 50, rng);

    expect(history).toHaveLength(50);
  });

  it('should reuse the oldest history entry when every clip was played recently', () => {
    const clips = pool(3);
    const history: number[] = [];
    const rng = seedrandom('test-seed');

    const first = pickSingleCommercial(clips, history, 5, rng).clip?.id;
    const second = pickSingleCommercial(clips, history, 5, rng).clip?.id;
    const third = pickSingleCommercial(clips, history, 5, rng).clip?.id;
    expect(new Set([first, second, third]).size).toBe(3);

    const fourth = pickSingleCommercial(clips, history, 5, rng).clip?.id;
    expect(fourth).toBe(first);
  });

  it('should use the clip duration, or 30 seconds when unknown', () => {
    const rng = seedrandom('test-seed');
    expect(pickSingleCommercial([fakeCommercial('a', 45)], [], 1, rng).durationSecs).toBe(45);
    expect(pickSingleCommercial([fakeCommercial('b', null)], [], 1, rng).durationSecs).toBe(30);
    expect(pickSingleCommercial([fakeCommercial('c', 0)], [], 1, rng).durationSecs).toBe(30);
  });

  it('should pick uniformly from the eligible clips', () => {
    const clips = pool(4);
    // History blocks clips 0 and 1; rng 0.75 selects the second eligible clip
    const pick = pickSingleCommercial(clips, [0, 1], 2, () => 0.75);

    expect(pick.clip?.id).toBe('ad-3');
  });
});
