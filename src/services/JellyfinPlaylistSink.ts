import type { Api, Jellyfin } from '@jellyfin/sdk';
import { getItemsApi, getLibraryApi, getPlaylistsApi } from '@jellyfin/sdk/lib/utils/api/index.js';
import type { PlaylistSink, ScheduledItem } from '../types/index.js';
import type { JellyfinConnection } from './JellyfinCatalog.js';
import { createJellyfin } from './JellyfinCatalog.js';
import { UpstreamError, errorMessage } from './errors.js';

/** Items per create/append request */
export const PLAYLIST_CHUNK_SIZE = 200;

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Publishes generated playlists to Jellyfin. An existing playlist with the
 * same name is deleted first, then the new one is created from the first
 * chunk of items and the remaining chunks are appended in order.
 */
export class JellyfinPlaylistSink implements PlaylistSink {
  private connection: JellyfinConnection | null;
  private jellyfin: Jellyfin;
  private api: Api | null = null;

  constructor(connection: JellyfinConnection | null, jellyfin: Jellyfin = createJellyfin()) {
    this.connection = connection;
    this.jellyfin = jellyfin;
  }

  private getApi(): Api {
    if (!this.connection) throw new UpstreamError('No Jellyfin server configured (set JELLYFIN_URL and JELLYFIN_TOKEN)');
    if (!this.api) {
      this.api = this.jellyfin.createApi(this.connection.url, this.connection.token);
    }
    return this.api;
  }

  async publish(playlistName: string, items: ScheduledItem[]): Promise<void> {
    const api = this.getApi();
    const userId = this.connection?.userId || undefined;

    try {
      await this.deleteExisting(api, playlistName);

      const [first = [], ...rest] = chunk(items.map(item => item.id), PLAYLIST_CHUNK_SIZE);
      const created = await getPlaylistsApi(api).createPlaylist({
        createPlaylistDto: {
          Name: playlistName,
          Ids: first,
          UserId: userId,
          MediaType: 'Video',
        },
      });

      const playlistId = created.data.Id;
      if (!playlistId) throw new Error('Jellyfin did not return a playlist id');

      for (const ids of rest) {
        await getPlaylistsApi(api).addItemToPlaylist({ playlistId, ids, userId });
      }

      console.log(`[Jellyfin] Published playlist '${playlistName}' with ${items.length} items`);
    } catch (err) {
      if (err instanceof UpstreamError) throw err;
      console.error(`[Jellyfin] Failed to publish playlist '${playlistName}':`, err);
      throw new UpstreamError(`Failed to publish playlist '${playlistName}': ${errorMessage(err)}`, { cause: err });
    }
  }

  private async deleteExisting(api: Api, playlistName: string): Promise<void> {
    const response = await getItemsApi(api).getItems({
      userId: this.connection?.userId || undefined,
      includeItemTypes: ['Playlist'],
      recursive: true,
      searchTerm: playlistName,
    });

    const existing = (response.data.Items ?? []).filter(
      item => item.Id && item.Name?.toLowerCase() === playlistName.toLowerCase()
    );
    for (const item of existing) {
      if (!item.Id) continue;
      await getLibraryApi(api).deleteItem({ itemId: item.Id });
      console.log(`[Jellyfin] Removed previous playlist '${item.Name}'`);
    }
  }
}
