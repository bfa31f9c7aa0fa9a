import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import * as queries from '../../src/db/queries.js';
import { GenerationService } from '../../src/services/GenerationService.js';
import { JellyfinCatalog } from '../../src/services/JellyfinCatalog.js';
import {
  GenerationInProgressError,
  PlaylistNotFoundError,
  UpstreamError,
} from '../../src/services/errors.js';
import { FakeSink, createMockLibrary, createTestDb } from '../helpers/setup.js';

describe('GenerationService', () => {
  let db: Database.Database;
  let sink: FakeSink;
  let service: GenerationService;

  beforeEach(() => {
    db = createTestDb();
    const catalog = new JellyfinCatalog(db, null);
    catalog.load(createMockLibrary());
    sink = new FakeSink();
    service = new GenerationService(db, catalog, sink);

    // Alpha's year is unknown locally; the library says 1990
    const alpha = queries.createShow(db, { name: 'Alpha' });
    const beta = queries.createShow(db, { name: 'Beta', year: 1985 });
    const playlist = queries.createPlaylist(db, { name: 'Weeknights' });
    queries.addShowToPlaylist(db, playlist.id, alpha.id);
    queries.addShowToPlaylist(db, playlist.id, beta.id);
  });

  function positions(): Record<string, string> {
    const playlist = queries.getPlaylistByName(db, 'Weeknights');
    if (!playlist) throw new Error('fixture playlist missing');
    return Object.fromEntries(
      queries.getPlaylistShows(db, playlist.id).map(s => [s.show_name, `${s.current_season}/${s.current_episode}`])
    );
  }

  it('should publish the generated playlist to the sink', async () => {
    const { summary } = await service.generate('Weeknights', { episodeCount: 4 });

    expect(sink.published).toHaveLength(1);
    expect(sink.published[0].name).toBe('Weeknights');
    // Beta (1985) sorts before Alpha (1990); a break follows every episode but the last
    expect(sink.published[0].items.map(i => i.kind)).toEqual([
      'episode', 'commercial', 'episode', 'commercial', 'episode', 'commercial', 'episode',
    ]);
    expect(summary.episode_count).toBe(4);
    expect(summary.total_items).toBe(7);
    expect(summary.episodes_by_show).toEqual({ Beta: 2, Alpha: 2 });
    expect(summary.commercial_blocks).toBe(3);
    expect(summary.preview).toBe(false);
  });

  it('should save the new positions', async () => {
    await service.generate('Weeknights', { episodeCount: 3 });

    expect(positions()).toEqual({ Alpha: '1/2', Beta: '1/3' });
  });

  it('should pick up where the previous run stopped', async () => {
    await service.generate('Weeknights', { episodeCount: 2 });
    await service.generate('Weeknights', { episodeCount: 2 });

    const ids = sink.published[1].items.filter(i => i.kind === 'episode').map(i => i.id);
    expect(ids).toEqual(['series-beta-s1e2', 'series-alpha-s1e2']);
  });

  it('should start over from the first episode when asked', async () => {
    await service.generate('Weeknights', { episodeCount: 2 });
    await service.generate('Weeknights', { episodeCount: 2, fromStart: true });

    const ids = sink.published[1].items.filter(i => i.kind === 'episode').map(i => i.id);
    expect(ids).toEqual(['series-beta-s1e1', 'series-alpha-s1e1']);
  });

  it('should save premiere years learned from the library', async () => {
    await service.generate('Weeknights', { episodeCount: 1 });

    expect(queries.getShowByName(db, 'Alpha')?.year).toBe(1990);
    expect(queries.getShowByName(db, 'Beta')?.year).toBe(1985);
  });

  it('should record the run in history', async () => {
    await service.generate('Weeknights', { episodeCount: 3 });

    const history = queries.getHistory(db);
    expect(history).toHaveLength(1);
    expect(history[0].playlist_name).toBe('Weeknights');
    expect(history[0].episode_count).toBe(3);
    expect(history[0].shows).toEqual(['Beta', 'Alpha']);
  });

  it('should keep only the configured number of history entries', async () => {
    queries.setSetting(db, 'history_limit', 2);
    for (let i = 0; i < 3; i++) {
      await service.generate('Weeknights', { episodeCount: 1, fromStart: true });
    }

    expect(queries.getHistory(db)).toHaveLength(2);
  });

  it('should aim for the playlist default and stop when every show runs out', async () => {
    const { summary } = await service.generate('Weeknights');

    expect(summary.episode_count).toBe(5);
    expect(summary.target_episode_count).toBe(30);
    expect(summary.dropped_shows).toEqual(['Beta', 'Alpha']);
    expect(positions()).toEqual({ Alpha: '1/4', Beta: '1/3' });
  });

  it('should neither publish nor save anything for a preview', async () => {
    const { summary, items } = await service.generate('Weeknights', { episodeCount: 2, preview: true });

    expect(summary.preview).toBe(true);
    expect(items.filter(i => i.kind === 'episode')).toHaveLength(2);
    expect(sink.published).toHaveLength(0);
    expect(positions()).toEqual({ Alpha: '1/1', Beta: '1/1' });
    expect(queries.getHistory(db)).toHaveLength(0);
    expect(queries.getShowByName(db, 'Alpha')?.year).toBeNull();
  });

  it('should save nothing when publishing fails', async () => {
    sink.fail = new UpstreamError('Jellyfin unavailable');

    await expect(service.generate('Weeknights', { episodeCount: 2 })).rejects.toBeInstanceOf(UpstreamError);
    expect(positions()).toEqual({ Alpha: '1/1', Beta: '1/1' });
    expect(queries.getHistory(db)).toHaveLength(0);
    expect(queries.getShowByName(db, 'Alpha')?.year).toBeNull();
  });

  it('should reject an unknown playlist', async () => {
    await expect(service.generate('Mornings')).rejects.toBeInstanceOf(PlaylistNotFoundError);
  });

  it('should find playlists regardless of case', async () => {
    const { summary } = await service.generate('WEEKNIGHTS', { episodeCount: 1 });
    expect(summary.playlist_name).toBe('Weeknights');
  });

  it('should reject a second run of the same playlist while one is in progress', async () => {
    let release: () => void = () => {};
    sink.gate = new Promise<void>(resolve => { release = resolve; });

    const first = service.generate('Weeknights', { episodeCount: 1 });
    expect(service.isRunning('weeknights')).toBe(true);
    await expect(service.generate('Weeknights', { episodeCount: 1 })).rejects.toBeInstanceOf(GenerationInProgressError);

    release();
    await first;
    expect(service.isRunning('Weeknights')).toBe(false);
  });

  it('should use the caller\'s seed, or derive one', async () => {
    const seeded = await service.generate('Weeknights', { episodeCount: 1, seed: 'test-seed', preview: true });
    const derived = await service.generate('Weeknights', { episodeCount: 1, preview: true });

    expect(seeded.summary.seed).toBe('test-seed');
    expect(derived.summary.seed).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should forward progress for each episode', async () => {
    const progress: [number, number][] = [];
    await service.generate('Weeknights', {
      episodeCount: 2,
      onProgress: (current, total) => progress.push([current, total]),
    });

    expect(progress).toEqual([[1, 2], [2, 2]]);
  });
});
