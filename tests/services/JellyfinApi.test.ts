import { describe, it, expect, beforeEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import * as queries from '../../src/db/queries.js';
import { JellyfinCatalog } from '../../src/services/JellyfinCatalog.js';
import { JellyfinPlaylistSink, PLAYLIST_CHUNK_SIZE, chunk } from '../../src/services/JellyfinPlaylistSink.js';
import { UpstreamError } from '../../src/services/errors.js';
import type { ScheduledItem } from '../../src/types/index.js';
import { createTestDb, fakeCommercial } from '../helpers/setup.js';

const sdk = vi.hoisted(() => ({
  getItems: vi.fn(),
  getUserViews: vi.fn(),
  createPlaylist: vi.fn(),
  addItemToPlaylist: vi.fn(),
  deleteItem: vi.fn(),
}));

vi.mock('@jellyfin/sdk/lib/utils/api/index.js', () => ({
  getItemsApi: () => ({ getItems: sdk.getItems }),
  getUserViewsApi: () => ({ getUserViews: sdk.getUserViews }),
  getPlaylistsApi: () => ({ createPlaylist: sdk.createPlaylist, addItemToPlaylist: sdk.addItemToPlaylist }),
  getLibraryApi: () => ({ deleteItem: sdk.deleteItem }),
}));

const connection = { url: 'http://jellyfin.test:8096', token: 'test-secret', userId: 'user-1' };

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

describe('JellyfinCatalog.syncLibrary', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    sdk.getUserViews.mockResolvedValue({
      data: { Items: [{ Id: 'view-tv', Name: 'TV Shows' }, { Id: 'view-ads', Name: 'Commercials' }] },
    });
    sdk.getItems.mockImplementation(async (params: { parentId: string; startIndex: number }) => {
      if (params.parentId === 'view-ads') {
        return {
          data: {
            Items: [{ Id: 'ad-1', Name: 'Robot', Type: 'Video', Path: '/ads/Toys/robot.mp4', RunTimeTicks: 300_000_000 }],
            TotalRecordCount: 1,
          },
        };
      }
      // Two pages for the TV library
      const all = [
        { Id: 'series-alpha', Name: 'Alpha', Type: 'Series', ProductionYear: 1990 },
        { Id: 'a-1', Name: 'Pilot', Type: 'Episode', SeriesId: 'series-alpha', ParentIndexNumber: 1, IndexNumber: 1 },
        { Id: 'a-2', Name: 'Second', Type: 'Episode', SeriesId: 'series-alpha', ParentIndexNumber: 1, IndexNumber: 2 },
      ];
      const page = params.startIndex === 0 ? all.slice(0, 2) : all.slice(params.startIndex);
      return { data: { Items: page, TotalRecordCount: all.length } };
    });
  });

  it('should load every library into the snapshot', async () => {
    const catalog = new JellyfinCatalog(db, connection);
    const stats = await catalog.syncLibrary();

    expect(stats).toEqual({ shows: 1, episodes: 2, commercials: 1 });
    expect(catalog.findShow('Alpha', 'TV Shows')?.id).toBe('series-alpha');
    expect(catalog.listCommercials('Commercials').map(c => c.durationSeconds)).toEqual([30]);
  });

  it('should page through large libraries', async () => {
    const catalog = new JellyfinCatalog(db, connection);
    await catalog.syncLibrary();

    const tvCalls = sdk.getItems.mock.calls.filter(([params]) => params.parentId === 'view-tv');
    expect(tvCalls.map(([params]) => params.startIndex)).toEqual([0, 2]);
  });

  it('should cache the synced library in the database', async () => {
    const catalog = new JellyfinCatalog(db, connection);
    await catalog.syncLibrary();

    expect(queries.getCachedLibrary(db)).toHaveLength(4);
  });

  it('should wrap server failures in an upstream error', async () => {
    sdk.getUserViews.mockRejectedValue(new Error('ECONNREFUSED'));
    const catalog = new JellyfinCatalog(db, connection);

    await expect(catalog.syncLibrary()).rejects.toMatchObject({
      name: 'UpstreamError',
      status: 502,
      message: 'Failed to list Jellyfin libraries',
    });
  });
});

describe('JellyfinPlaylistSink', () => {
  function items(count: number): ScheduledItem[] {
    return Array.from({ length: count }, (_, i) => fakeCommercial(`item-${i}`));
  }

  beforeEach(() => {
    sdk.getItems.mockResolvedValue({ data: { Items: [] } });
    sdk.createPlaylist.mockResolvedValue({ data: { Id: 'playlist-1' } });
    sdk.addItemToPlaylist.mockResolvedValue({ data: undefined });
    sdk.deleteItem.mockResolvedValue({ data: undefined });
  });

  it('should create the playlist from the first chunk and append the rest', async () => {
    const sink = new JellyfinPlaylistSink(connection);
    await sink.publish('Weeknights', items(450));

    expect(sdk.createPlaylist).toHaveBeenCalledTimes(1);
    const dto = sdk.createPlaylist.mock.calls[0][0].createPlaylistDto;
    expect(dto.Name).toBe('Weeknights');
    expect(dto.Ids).toHaveLength(200);
    expect(dto.Ids[0]).toBe('item-0');

    expect(sdk.addItemToPlaylist).toHaveBeenCalledTimes(2);
    const appended = sdk.addItemToPlaylist.mock.calls.map(([params]) => params.ids);
    expect(appended[0]).toHaveLength(200);
    expect(appended[0][0]).toBe('item-200');
    expect(appended[1]).toHaveLength(50);
    expect(appended[1][49]).toBe('item-449');
    expect(sdk.addItemToPlaylist.mock.calls[0][0].playlistId).toBe('playlist-1');
  });

  it('should not append when everything fits in one chunk', async () => {
    const sink = new JellyfinPlaylistSink(connection);
    await sink.publish('Weeknights', items(12));

    expect(sdk.createPlaylist.mock.calls[0][0].createPlaylistDto.Ids).toHaveLength(12);
    expect(sdk.addItemToPlaylist).not.toHaveBeenCalled();
  });

  it('should delete an existing playlist with the same name first', async () => {
    sdk.getItems.mockResolvedValue({
      data: {
        Items: [
          { Id: 'old', Name: 'weeknights' },
          { Id: 'other', Name: 'Weeknights Classic' },
        ],
      },
    });
    const sink = new JellyfinPlaylistSink(connection);
    await sink.publish('Weeknights', items(3));

    expect(sdk.deleteItem).toHaveBeenCalledTimes(1);
    expect(sdk.deleteItem).toHaveBeenCalledWith({ itemId: 'old' });
  });

  it('should report failures as upstream errors', async () => {
    sdk.createPlaylist.mockRejectedValue(new Error('HTTP 500'));
    const sink = new JellyfinPlaylistSink(connection);

    const publish = sink.publish('Weeknights', items(3));
    await expect(publish).rejects.toBeInstanceOf(UpstreamError);
    await expect(publish).rejects.toThrow("Failed to publish playlist 'Weeknights': HTTP 500");
  });

  it('should fail without a configured server', async () => {
    const sink = new JellyfinPlaylistSink(null);
    await expect(sink.publish('Weeknights', items(1))).rejects.toBeInstanceOf(UpstreamError);
  });
});

describe('chunk', () => {
  it('should split a list into fixed-size pieces', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], PLAYLIST_CHUNK_SIZE)).toEqual([]);
  });
});
