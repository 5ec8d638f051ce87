import { describe, expect, it, vi } from 'vitest';
import { parseFilter, renderLibraryResults, renderMenu, secondsToHms, type NodeContext } from './didlLiteRenderer';
import { ROOT_MENU } from './menus';
import { parseObjectId, type ObjectPath } from './objectId';
import { TRACK_TAGS, type QueryTranslation, type RowKind } from './queryTranslator';
import type { LibraryBackend, LibraryResults, TrackRow } from './types';

const options = { baseUrl: 'http://host:9000' };

const parse = (id: string): ObjectPath => {
  const path = parseObjectId(id);
  if (path.kind === 'invalid') throw new Error(path.reason);
  return path;
};

const childrenOf = (id: string): NodeContext => ({ mode: 'children', parent: parse(id), parentId: id });

const translation = (rowKind: RowKind, totalCap?: number): QueryTranslation => ({
  kind: 'query',
  query: { command: 'titles', start: 0, limit: 10, params: {}, tags: '' },
  rowKind,
  ...(totalCap !== undefined ? { totalCap } : {}),
});

const createBackend = (tracks: TrackRow[] = []) => {
  const getTracks = vi.fn(async (ids: number[]) =>
    new Map(tracks.filter(track => ids.includes(track.id)).map(track => [track.id, track])),
  );
  const backend: LibraryBackend = {
    execute: vi.fn(async (): Promise<LibraryResults> => ({ count: 0 })),
    getTracks,
    lastScanTime: () => 0,
  };
  return { backend, getTracks };
};

const render = (rowKind: RowKind, results: LibraryResults, context: NodeContext, filter = '*', totalCap?: number) =>
  renderLibraryResults({
    translation: translation(rowKind, totalCap),
    results,
    context,
    filter,
    backend: createBackend().backend,
    options,
  });

describe('renderLibraryResults', () => {
  it('renders genre containers with child ids and escaped titles', async () => {
    const outcome = await render('genre', { count: 25, genres_loop: [{ id: 1, genre: 'Rock & Roll' }] }, childrenOf('/g'));

    expect(outcome.count).toBe(1);
    expect(outcome.total).toBe(25);
    expect(outcome.xml).toContain('<DIDL-Lite');
    expect(outcome.xml).toContain(
      '<container id="/g/1/a" parentID="/g" restricted="1"><upnp:class>object.container.genre.musicGenre</upnp:class><dc:title>Rock &amp; Roll</dc:title></container>',
    );
  });

  it('מציג רק את השדות האופציונליים שה-filter מבקש', async () => {
    const album = { id: 3, album: 'Blue', artist: 'Ann', year: 1999, artworkTrackId: 42 };

    const narrow = await render('album', { count: 1, albums_loop: [album] }, childrenOf('/a/5/l'), 'dc:creator');
    expect(narrow.xml).toContain(
      '<container id="/a/5/l/3/t" parentID="/a/5/l" restricted="1"><upnp:class>object.container.album.musicAlbum</upnp:class><dc:title>Blue</dc:title><dc:creator>Ann</dc:creator></container>',
    );

    const full = await render('album', { count: 1, albums_loop: [album] }, childrenOf('/a/5/l'));
    expect(full.xml).toContain(
      '<dc:creator>Ann</dc:creator><upnp:artist>Ann</upnp:artist><dc:date>1999-01-01</dc:date><upnp:albumArtURI>http://host:9000/music/42/cover</upnp:albumArtURI></container>',
    );
  });

  it('always emits res for a track and gates its attributes', async () => {
    const track: TrackRow = {
      id: 9, title: 'Song', artist: 'Ann', album: 'Blue', trackNumber: 2,
      duration: 185.5, fileSize: 1000, bitrate: 320000, sampleRate: 44100, sampleSize: 16, channels: 2,
    };
    const context: NodeContext = { mode: 'metadata', id: '/l/3/t/9', parentId: '/l/3/t' };

    const full = await render('track', { count: 1, titles_loop: [track] }, context);
    expect(full.xml).toContain('<item id="/l/3/t/9" parentID="/l/3/t" restricted="1">');
    expect(full.xml).toContain('<upnp:originalTrackNumber>2</upnp:originalTrackNumber>');
    expect(full.xml).toContain(
      '<res protocolInfo="http-get:*:audio/mpeg:*" duration="0:03:05.500" size="1000" bitrate="40000" sampleFrequency="44100" bitsPerSample="16" nrAudioChannels="2">http://host:9000/music/9/download</res>',
    );

    const bare = await render('track', { count: 1, titles_loop: [track] }, context, '');
    expect(bare.xml).toContain(
      '<dc:title>Song</dc:title><res protocolInfo="http-get:*:audio/mpeg:*">http://host:9000/music/9/download</res></item>',
    );
  });

  it('adjusts the total for playlists and stale tracks inside a music folder', async () => {
    const { backend, getTracks } = createBackend([{ id: 9, title: 'Kept' }]);
    const outcome = await renderLibraryResults({
      translation: translation('folder'),
      results: {
        count: 4,
        folder_loop: [
          { id: 4, filename: 'Sub', type: 'folder' },
          { id: 7, filename: 'list.m3u', type: 'playlist' },
          { id: 9, filename: 'a.mp3', type: 'track' },
          { id: 10, filename: 'b.mp3', type: 'track' },
        ],
      },
      context: childrenOf('/m/1/m'),
      filter: '*',
      backend,
      options,
    });

    expect(getTracks).toHaveBeenCalledWith([9, 10], TRACK_TAGS);
    expect(outcome.count).toBe(2);
    expect(outcome.total).toBe(2);
    expect(outcome.xml).toContain('<container id="/m/1/m/4/m" parentID="/m/1/m" restricted="1"><upnp:class>object.container.storageFolder</upnp:class>');
    expect(outcome.xml).toContain('<item id="/m/1/t/9" parentID="/m/1/m" restricted="1">');
    expect(outcome.xml).not.toContain('list.m3u');
  });

  it('caps the total for new music', async () => {
    const outcome = await render('album', { count: 500, albums_loop: [{ id: 1, album: 'Fresh' }] }, childrenOf('/n'), '*', 100);
    expect(outcome.total).toBe(100);
    expect(outcome.xml).toContain('id="/n/1/t"');
  });

  it('titles year zero as Unknown', async () => {
    const outcome = await render('year', { count: 1, years_loop: [{ year: 0 }] }, childrenOf('/y'));
    expect(outcome.xml).toContain('<container id="/y/0/l" parentID="/y" restricted="1"><upnp:class>object.container</upnp:class><dc:title>Unknown</dc:title></container>');
  });

  it('appends hashes to video container ids', async () => {
    const outcome = await render(
      'video',
      { count: 1, videos_loop: [{ id: '0a1b2c3d', title: 'Trip', width: 1920, height: 1080 }] },
      childrenOf('/va'),
    );
    expect(outcome.xml).toContain('<item id="/va/0a1b2c3d" parentID="/va" restricted="1"><upnp:class>object.item.videoItem</upnp:class>');
    expect(outcome.xml).toContain(
      '<res protocolInfo="http-get:*:video/mp4:*" resolution="1920x1080">http://host:9000/video/0a1b2c3d/download</res>',
    );
  });

  it('returns an empty string when nothing was rendered', async () => {
    expect(await render('artist', { count: 0, artists_loop: [] }, childrenOf('/a'))).toEqual({ xml: '', count: 0, total: 0 });
  });
});

describe('renderMenu', () => {
  it('sorts by title and pages the entries', () => {
    const outcome = renderMenu(ROOT_MENU, '-dc:title', { start: 0, limit: 2 });
    expect(outcome.count).toBe(2);
    expect(outcome.total).toBe(3);
    expect(outcome.xml).toContain(
      '<container id="/video" parentID="0" restricted="1" searchable="0"><upnp:class>object.container</upnp:class><dc:title>Video</dc:title></container><container id="/images"',
    );
    expect(outcome.xml).not.toContain('/music');
  });

  it('treats a zero limit as everything and an out of range start as empty', () => {
    expect(renderMenu(ROOT_MENU, '', { start: 0, limit: 0 }).count).toBe(3);
    expect(renderMenu(ROOT_MENU, '', { start: 5, limit: 10 })).toEqual({ xml: '', count: 0, total: 3 });
  });
});

describe('format helpers', () => {
  it('formats durations as H:MM:SS.mmm', () => {
    expect(secondsToHms(0)).toBe('0:00:00.000');
    expect(secondsToHms(3725.25)).toBe('1:02:05.250');
  });

  it('parses filters by exact membership', () => {
    const include = parseFilter('dc:creator, res@size');
    expect(include('dc:creator')).toBe(true);
    expect(include('res@size')).toBe(true);
    expect(include('res@duration')).toBe(false);
    expect(parseFilter('*')('anything')).toBe(true);
  });
});
