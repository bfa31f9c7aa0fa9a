import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import * as queries from '../../src/db/queries.js';
import { JellyfinCatalog } from '../../src/services/JellyfinCatalog.js';
import { UpstreamError } from '../../src/services/errors.js';
import type { ShowHandle } from '../../src/types/index.js';
import {
  createMockCommercial,
  createMockEpisodes,
  createMockLibrary,
  createMockSeries,
  createTestDb,
} from '../helpers/setup.js';

describe('JellyfinCatalog', () => {
  let db: Database.Database;
  let catalog: JellyfinCatalog;

  beforeEach(() => {
    db = createTestDb();
    catalog = new JellyfinCatalog(db, null);
    catalog.load(createMockLibrary());
  });

  function handle(name: string): ShowHandle {
    const found = catalog.findShow(name, 'TV Shows');
    if (!found) throw new Error(`fixture show ${name} missing`);
    return found;
  }

  describe('findShow', () => {
    it('should match show and library names regardless of case', () => {
      expect(catalog.findShow('alpha', 'tv shows')).toEqual({
        id: 'series-alpha',
        name: 'Alpha',
        library: 'TV Shows',
      });
    });

    it('should not find a show in a different library', () => {
      expect(catalog.findShow('Alpha', 'Anime')).toBeNull();
    });

    it('should not find an unknown show', () => {
      expect(catalog.findShow('Gamma', 'TV Shows')).toBeNull();
    });
  });

  describe('findEpisode', () => {
    it('should return the episode with its runtime in seconds', () => {
      expect(catalog.findEpisode(handle('Alpha'), 1, 2)).toEqual({
        kind: 'episode',
        id: 'series-alpha-s1e2',
        showName: 'Alpha',
        seasonNumber: 1,
        episodeNumber: 2,
        title: 'Alpha 1x2',
        durationSeconds: 1320,
      });
    });

    it('should return null past the last episode', () => {
      expect(catalog.findEpisode(handle('Alpha'), 1, 4)).toBeNull();
      expect(catalog.findEpisode(handle('Alpha'), 2, 1)).toBeNull();
    });
  });

  describe('nextSeasonNumber', () => {
    beforeEach(() => {
      const episodes = createMockEpisodes('series-gamma', 'Gamma', [2, 0, 1]);
      // Season numbers 1 and 3, plus a special in season 0
      catalog.load([
        createMockSeries('series-gamma', 'Gamma', 2001),
        ...episodes,
        {
          library: 'TV Shows',
          item: {
            Id: 'gamma-special',
            Name: 'Gamma Special',
            Type: 'Episode',
            SeriesId: 'series-gamma',
            ParentIndexNumber: 0,
            IndexNumber: 1,
          },
        },
      ]);
    });

    it('should return the next season that has episodes', () => {
      expect(catalog.nextSeasonNumber(handle('Gamma'), 1)).toBe(3);
    });

    it('should return null after the final season', () => {
      expect(catalog.nextSeasonNumber(handle('Gamma'), 3)).toBeNull();
    });

    it('should ignore specials', () => {
      expect(catalog.nextSeasonNumber(handle('Gamma'), -1)).toBe(1);
    });
  });

  describe('yearOf', () => {
    it('should return the production year, or null when unknown', () => {
      catalog.load([...createMockLibrary(), createMockSeries('series-delta', 'Delta')]);
      expect(catalog.yearOf(handle('Alpha'))).toBe(1990);
      expect(catalog.yearOf(handle('Delta'))).toBeNull();
    });
  });

  describe('listCommercials', () => {
    it('should return every clip in the named library', () => {
      const clips = catalog.listCommercials('commercials');
      expect(clips.map(c => c.id)).toEqual(['ad-1', 'ad-2', 'ad-3']);
      expect(clips[0]).toEqual({
        kind: 'commercial',
        id: 'ad-1',
        title: 'Ad ad-1',
        path: '/media/ads/Toys/robot.mp4',
        durationSeconds: 30,
      });
    });

    it('should return nothing for an unknown library', () => {
      expect(catalog.listCommercials('Bumpers')).toEqual([]);
    });
  });

  describe('commercialInventory', () => {
    it('should count clips per folder with uncategorized first', () => {
      catalog.load([
        ...createMockLibrary(),
        createMockCommercial('ad-4', '/media/ads/Toys/car.mp4', 45),
      ]);

      expect(catalog.commercialInventory('Commercials')).toEqual([
        { name: 'uncategorized', count: 1, duration_secs: 20 },
        { name: 'Food', count: 1, duration_secs: 15 },
        { name: 'Toys', count: 2, duration_secs: 75 },
      ]);
    });
  });

  describe('listSeries', () => {
    it('should list series with episode counts, optionally by library', () => {
      catalog.load([
        ...createMockLibrary(),
        createMockSeries('series-anime', 'Zeta', 1999, 'Anime'),
      ]);

      expect(catalog.listSeries()).toEqual([
        { name: 'Alpha', library: 'TV Shows', year: 1990, episode_count: 3 },
        { name: 'Beta', library: 'TV Shows', year: 1985, episode_count: 2 },
        { name: 'Zeta', library: 'Anime', year: 1999, episode_count: 0 },
      ]);
      expect(catalog.listSeries('anime').map(s => s.name)).toEqual(['Zeta']);
    });
  });

  describe('stats', () => {
    it('should count shows, episodes and other videos', () => {
      expect(catalog.stats()).toEqual({ shows: 2, episodes: 5, commercials: 3 });
    });
  });

  describe('hydrate', () => {
    it('should restore the snapshot from the library cache', () => {
      queries.replaceLibraryCache(db, createMockLibrary());
      const restored = new JellyfinCatalog(db, null);

      expect(restored.hydrate()).toBe(10);
      expect(restored.findShow('Beta', 'TV Shows')?.id).toBe('series-beta');
      expect(restored.listCommercials('Commercials')).toHaveLength(3);
    });
  });

  describe('syncLibrary', () => {
    it('should fail with an upstream error when no server is configured', async () => {
      expect(catalog.isConfigured).toBe(false);
      await expect(catalog.syncLibrary()).rejects.toBeInstanceOf(UpstreamError);
    });
  });
});
