import { EventEmitter } from 'events';
import { readFile } from 'node:fs/promises';
import { LibraryQueryError } from './errors';
import { createModuleLogger } from './logger';
import type {
  AlbumRow,
  FolderRow,
  ImageRow,
  LibraryBackend,
  LibraryQuery,
  LibraryResults,
  SearchPredicate,
  SearchProperty,
  SortKey,
  SortProperty,
  TrackRow,
  VideoRow,
} from './types';

const logger = createModuleLogger('InMemoryLibrary');

// --- מבנה קובץ הספרייה ---

export interface NamedRecord {
  id: number;
  name: string;
}

export interface AlbumRecord {
  id: number;
  title: string;
  artistId?: number;
  year?: number;
  /** @hebrew שניות מאז epoch; קובע את הסדר ב"מוזיקה חדשה". */
  addedTime?: number;
  artworkTrackId?: number;
}

export interface TrackRecord {
  id: number;
  title: string;
  albumId?: number;
  artistId?: number;
  genreId?: number;
  folderId?: number;
  filename?: string;
  trackNumber?: number;
  year?: number;
  duration?: number;
  bitrate?: number;
  sampleRate?: number;
  sampleSize?: number;
  channels?: number;
  fileSize?: number;
  contentType?: string;
  addedTime?: number;
  modifiedTime?: number;
  updatedTime?: number;
}

export interface FolderRecord {
  id: number;
  name: string;
  parentId?: number;
}

export interface PlaylistRecord {
  id: number;
  name: string;
  trackIds: number[];
  folderId?: number;
}

export interface MediaRecord {
  id: string;
  title: string;
  album?: string;
  duration?: number;
  width?: number;
  height?: number;
  fileSize?: number;
  mimeType?: string;
  takenTime?: number;
  modifiedTime?: number;
  addedTime?: number;
  updatedTime?: number;
}

export interface LibrarySnapshot {
  scanTime?: number;
  artists: NamedRecord[];
  genres: NamedRecord[];
  albums: AlbumRecord[];
  tracks: TrackRecord[];
  folders: FolderRecord[];
  playlists: PlaylistRecord[];
  videos: MediaRecord[];
  images: MediaRecord[];
}

// --- אימות ---

type Fields = Record<string, unknown>;

const isObject = (value: unknown): value is Fields => typeof value === 'object' && value !== null && !Array.isArray(value);

function field<T>(record: Fields, name: string, guard: (value: unknown) => value is T, where: string): T {
  const value = record[name];
  if (!guard(value)) {
    throw new LibraryQueryError(`${where}: field '${name}' is missing or has the wrong type`);
  }
  return value;
}

function optionalField<T>(record: Fields, name: string, guard: (value: unknown) => value is T, where: string): T | undefined {
  return record[name] === undefined || record[name] === null ? undefined : field(record, name, guard, where);
}

const isNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);
const isString = (value: unknown): value is string => typeof value === 'string';
const isNumberArray = (value: unknown): value is number[] => Array.isArray(value) && value.every(isNumber);

function records<T>(snapshot: Fields, name: string, build: (record: Fields, where: string) => T): T[] {
  const list = snapshot[name];
  if (list === undefined) {
    return [];
  }
  if (!Array.isArray(list)) {
    throw new LibraryQueryError(`library.${name} must be an array`);
  }
  return list.map((record: unknown, index) => {
    const where = `library.${name}[${index}]`;
    if (!isObject(record)) {
      throw new LibraryQueryError(`${where} must be an object`);
    }
    return build(record, where);
  });
}

/**
 * @hebrew מאמת אובייקט JSON ובונה ממנו LibrarySnapshot. זורק LibraryQueryError על מבנה שגוי.
 */
export function parseLibrarySnapshot(value: unknown): LibrarySnapshot {
  if (!isObject(value)) {
    throw new LibraryQueryError('library file must contain a JSON object');
  }

  const named = (record: Fields, where: string): NamedRecord => ({
    id: field(record, 'id', isNumber, where),
    name: field(record, 'name', isString, where),
  });

  const media = (record: Fields, where: string): MediaRecord => ({
    id: field(record, 'id', isString, where),
    title: field(record, 'title', isString, where),
    album: optionalField(record, 'album', isString, where),
    duration: optionalField(record, 'duration', isNumber, where),
    width: optionalField(record, 'width', isNumber, where),
    height: optionalField(record, 'height', isNumber, where),
    fileSize: optionalField(record, 'fileSize', isNumber, where),
    mimeType: optionalField(record, 'mimeType', isString, where),
    takenTime: optionalField(record, 'takenTime', isNumber, where),
    modifiedTime: optionalField(record, 'modifiedTime', isNumber, where),
    addedTime: optionalField(record, 'addedTime', isNumber, where),
    updatedTime: optionalField(record, 'updatedTime', isNumber, where),
  });

  return {
    scanTime: optionalField(value, 'scanTime', isNumber, 'library'),
    artists: records(value, 'artists', named),
    genres: records(value, 'genres', named),
    albums: records(value, 'albums', (record, where) => ({
      id: field(record, 'id', isNumber, where),
      title: field(record, 'title', isString, where),
      artistId: optionalField(record, 'artistId', isNumber, where),
      year: optionalField(record, 'year', isNumber, where),
      addedTime: optionalField(record, 'addedTime', isNumber, where),
      artworkTrackId: optionalField(record, 'artworkTrackId', isNumber, where),
    })),
    tracks: records(value, 'tracks', (record, where) => ({
      id: field(record, 'id', isNumber, where),
      title: field(record, 'title', isString, where),
      albumId: optionalField(record, 'albumId', isNumber, where),
      artistId: optionalField(record, 'artistId', isNumber, where),
      genreId: optionalField(record, 'genreId', isNumber, where),
      folderId: optionalField(record, 'folderId', isNumber, where),
      filename: optionalField(record, 'filename', isString, where),
      trackNumber: optionalField(record, 'trackNumber', isNumber, where),
      year: optionalField(record, 'year', isNumber, where),
      duration: optionalField(record, 'duration', isNumber, where),
      bitrate: optionalField(record, 'bitrate', isNumber, where),
      sampleRate: optionalField(record, 'sampleRate', isNumber, where),
      sampleSize: optionalField(record, 'sampleSize', isNumber, where),
      channels: optionalField(record, 'channels', isNumber, where),
      fileSize: optionalField(record, 'fileSize', isNumber, where),
      contentType: optionalField(record, 'contentType', isString, where),
      addedTime: optionalField(record, 'addedTime', isNumber, where),
      modifiedTime: optionalField(record, 'modifiedTime', isNumber, where),
      updatedTime: optionalField(record, 'updatedTime', isNumber, where),
    })),
    folders: records(value, 'folders', (record, where) => ({
      id: field(record, 'id', isNumber, where),
      name: field(record, 'name', isString, where),
      parentId: optionalField(record, 'parentId', isNumber, where),
    })),
    playlists: records(value, 'playlists', (record, where) => ({
      id: field(record, 'id', isNumber, where),
      name: field(record, 'name', isString, where),
      trackIds: optionalField(record, 'trackIds', isNumberArray, where) ?? [],
      folderId: optionalField(record, 'folderId', isNumber, where),
    })),
    videos: records(value, 'videos', media),
    images: records(value, 'images', media),
  };
}

export function emptySnapshot(): LibrarySnapshot {
  return { artists: [], genres: [], albums: [], tracks: [], folders: [], playlists: [], videos: [], images: [] };
}

// --- השוואות ---

const compareText = (a: string | undefined, b: string | undefined): number =>
  (a ?? '').localeCompare(b ?? '', undefined, { sensitivity: 'base' });

const compareNumber = (a: number | undefined, b: number | undefined): number => (a ?? 0) - (b ?? 0);

const pad2 = (value: number): string => String(value).padStart(2, '0');

interface DateParts {
  year: string;
  month: string;
  day: string;
}

function datePartsOf(seconds: number): DateParts {
  const date = new Date(seconds * 1000);
  return { year: String(date.getUTCFullYear()), month: pad2(date.getUTCMonth() + 1), day: pad2(date.getUTCDate()) };
}

// ערכי העמודות של שורה לצורך חיפוש ומיון
type RowValues = Partial<Record<SearchProperty | SortProperty, string | number>>;

function evaluate(predicate: SearchPredicate, values: RowValues): boolean {
  switch (predicate.kind) {
    case 'all':
      return true;
    case 'logical':
      return predicate.operator === 'and'
        ? evaluate(predicate.left, values) && evaluate(predicate.right, values)
        : evaluate(predicate.left, values) || evaluate(predicate.right, values);
    case 'exists':
      return (values[predicate.property] !== undefined) === predicate.exists;
    case 'compare': {
      const actual = values[predicate.property];
      if (actual === undefined) {
        return false;
      }
      const text = String(actual).toUpperCase();
      const expected = predicate.value.toUpperCase();
      switch (predicate.operator) {
        case 'contains':
          return text.includes(expected);
        case 'doesNotContain':
          return !text.includes(expected);
        default: {
          const numericValue = predicate.value.trim() !== '' && !Number.isNaN(Number(predicate.value));
          const order = typeof actual === 'number' && numericValue
            ? actual - Number(predicate.value)
            : text.localeCompare(expected);
          switch (predicate.operator) {
            case '=': return order === 0;
            case '!=': return order !== 0;
            case '<': return order < 0;
            case '<=': return order <= 0;
            case '>': return order > 0;
            case '>=': return order >= 0;
          }
        }
      }
    }
  }
}

function compareBy(keys: SortKey[], a: RowValues, b: RowValues): number {
  for (const { property, direction } of keys) {
    const left = a[property];
    const right = b[property];
    const order = typeof left === 'number' || typeof right === 'number'
      ? compareNumber(typeof left === 'number' ? left : undefined, typeof right === 'number' ? right : undefined)
      : compareText(left, right);
    if (order !== 0) {
      return direction === 'ASC' ? order : -order;
    }
  }
  return 0;
}

const page = <T>(rows: T[], query: LibraryQuery): T[] => rows.slice(query.start, query.start + query.limit);

/**
 * @class InMemoryLibrary
 * @description LibraryBackend שעונה על השאילתות מתוך תמונת ספרייה בזיכרון.
 * מפיץ את האירוע 'rescan' (עם זמן הסריקה בשניות) בכל טעינה מחדש.
 */
export class InMemoryLibrary extends EventEmitter implements LibraryBackend {
  private snapshot: LibrarySnapshot;
  private scanTime: number;

  constructor(snapshot: LibrarySnapshot = emptySnapshot()) {
    super();
    this.snapshot = snapshot;
    this.scanTime = snapshot.scanTime ?? Math.floor(Date.now() / 1000);
  }

  static async fromFile(filePath: string): Promise<InMemoryLibrary> {
    const library = new InMemoryLibrary(await InMemoryLibrary.readSnapshot(filePath));
    logger.info(`Loaded library from ${filePath}`, library.stats());
    return library;
  }

  private static async readSnapshot(filePath: string): Promise<LibrarySnapshot> {
    const text = await readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(text);
    return parseLibrarySnapshot(parsed);
  }

  /**
   * @hebrew מחליף את תוכן הספרייה ומדווח על סיום סריקה.
   */
  reload(snapshot: LibrarySnapshot): void {
    this.snapshot = snapshot;
    this.scanTime = Math.max(this.scanTime, snapshot.scanTime ?? Math.floor(Date.now() / 1000));
    logger.info('Library reloaded', this.stats());
    this.emit('rescan', this.scanTime);
  }

  async reloadFromFile(filePath: string): Promise<void> {
    this.reload(await InMemoryLibrary.readSnapshot(filePath));
  }

  stats(): Record<string, number> {
    const { artists, albums, tracks, videos, images } = this.snapshot;
    return { artists: artists.length, albums: albums.length, tracks: tracks.length, videos: videos.length, images: images.length };
  }

  lastScanTime(): number {
    return this.scanTime;
  }

  async getTracks(trackIds: number[], _tags: string): Promise<Map<number, TrackRow>> {
    const wanted = new Set(trackIds);
    const found = new Map<number, TrackRow>();
    for (const track of this.snapshot.tracks) {
      if (wanted.has(track.id)) {
        found.set(track.id, this.trackRow(track));
      }
    }
    return found;
  }

  async execute(query: LibraryQuery): Promise<LibraryResults> {
    logger.trace(`execute ${query.command}`, { start: query.start, limit: query.limit, params: query.params });

    switch (query.command) {
      case 'artists':
        return this.artists(query);
      case 'albums':
        return this.albums(query);
      case 'genres': {
        const genres = this.snapshot.genres
          .filter(genre => query.params.genreId === undefined || genre.id === query.params.genreId)
          .sort((a, b) => compareText(a.name, b.name))
          .map(genre => ({ id: genre.id, genre: genre.name }));
        return { count: genres.length, genres_loop: page(genres, query) };
      }
      case 'years': {
        const years = [...new Set(this.snapshot.albums.map(album => album.year ?? 0))]
          .filter(year => query.params.year === undefined || year === query.params.year)
          .sort((a, b) => b - a)
          .map(year => ({ year }));
        return { count: years.length, years_loop: page(years, query) };
      }
      case 'musicfolder':
        return this.musicFolder(query);
      case 'titles':
        return this.titles(query);
      case 'playlisttracks': {
        const playlist = this.snapshot.playlists.find(item => item.id === query.params.playlistId);
        if (!playlist) {
          throw new LibraryQueryError(`Playlist ${query.params.playlistId} not found`);
        }
        const tracks = playlist.trackIds
          .map(id => this.snapshot.tracks.find(track => track.id === id))
          .filter((track): track is TrackRecord => track !== undefined)
          .map(track => this.trackRow(track));
        return { count: tracks.length, playlisttracks_loop: page(tracks, query) };
      }
      case 'playlists': {
        const playlists = this.snapshot.playlists
          .filter(playlist => query.params.playlistId === undefined || playlist.id === query.params.playlistId)
          .sort((a, b) => compareText(a.name, b.name))
          .map(playlist => ({ id: playlist.id, playlist: playlist.name }));
        return { count: playlists.length, playlists_loop: page(playlists, query) };
      }
      case 'video_titles':
        return this.videos(query);
      case 'image_titles':
        return this.images(query);
    }
  }

  // --- שאילתות מוזיקה ---

  private artistName(id: number | undefined): string | undefined {
    return this.snapshot.artists.find(artist => artist.id === id)?.name;
  }

  private trackRow(track: TrackRecord): TrackRow {
    const album = this.snapshot.albums.find(item => item.id === track.albumId);
    return {
      id: track.id,
      title: track.title,
      artist: this.artistName(track.artistId ?? album?.artistId),
      album: album?.title,
      albumId: track.albumId,
      genre: this.snapshot.genres.find(genre => genre.id === track.genreId)?.name,
      year: track.year ?? album?.year,
      trackNumber: track.trackNumber,
      duration: track.duration,
      bitrate: track.bitrate,
      sampleRate: track.sampleRate,
      sampleSize: track.sampleSize,
      channels: track.channels,
      fileSize: track.fileSize,
      contentType: track.contentType,
      artworkTrackId: album?.artworkTrackId,
      updatedTime: track.updatedTime,
    };
  }

  private trackValues(track: TrackRecord): RowValues {
    const row = this.trackRow(track);
    const values: RowValues = {
      'dc:title': row.title,
      '@id': row.id,
      'dc:creator': row.artist,
      'upnp:artist': row.artist,
      'upnp:album': row.album,
      'upnp:genre': row.genre,
      'upnp:originalTrackNumber': row.trackNumber,
      'dc:date': track.modifiedTime,
      'pv:modificationTime': track.modifiedTime,
      'pv:addedTime': track.addedTime,
      'pv:lastUpdated': track.updatedTime,
    };
    return values;
  }

  private artists(query: LibraryQuery): LibraryResults {
    const { genreId, artistId } = query.params;
    const inGenre = (id: number) =>
      this.snapshot.tracks.some(track => track.genreId === genreId && this.trackArtistId(track) === id);

    const artists = this.snapshot.artists
      .filter(artist => artistId === undefined || artist.id === artistId)
      .filter(artist => genreId === undefined || inGenre(artist.id))
      .sort((a, b) => compareText(a.name, b.name))
      .map(artist => ({ id: artist.id, artist: artist.name }));
    return { count: artists.length, artists_loop: page(artists, query) };
  }

  private trackArtistId(track: TrackRecord): number | undefined {
    return track.artistId ?? this.snapshot.albums.find(album => album.id === track.albumId)?.artistId;
  }

  private albums(query: LibraryQuery): LibraryResults {
    const { artistId, genreId, year, albumId, sort } = query.params;
    const tracksOf = (id: number) => this.snapshot.tracks.filter(track => track.albumId === id);

    let albums = this.snapshot.albums
      .filter(album => albumId === undefined || album.id === albumId)
      .filter(album => year === undefined || (album.year ?? 0) === year)
      .filter(album =>
        artistId === undefined ||
        album.artistId === artistId ||
        tracksOf(album.id).some(track => track.artistId === artistId))
      .filter(album => genreId === undefined || tracksOf(album.id).some(track => track.genreId === genreId));

    albums = sort === 'new'
      ? albums.sort((a, b) => compareNumber(b.addedTime, a.addedTime) || b.id - a.id)
      : albums.sort((a, b) => compareText(a.title, b.title));

    const rows: AlbumRow[] = albums.map(album => ({
      id: album.id,
      album: album.title,
      artist: this.artistName(album.artistId),
      year: album.year,
      artworkTrackId: album.artworkTrackId,
    }));
    return { count: rows.length, albums_loop: page(rows, query) };
  }

  private musicFolder(query: LibraryQuery): LibraryResults {
    const { folderId, returnTop } = query.params;

    if (returnTop) {
      const folder = this.snapshot.folders.find(item => item.id === folderId);
      const rows: FolderRow[] = folder ? [{ id: folder.id, filename: folder.name, type: 'folder' }] : [];
      return { count: rows.length, folder_loop: rows };
    }

    const entries: FolderRow[] = [
      ...this.snapshot.folders
        .filter(folder => folder.parentId === folderId)
        .map((folder): FolderRow => ({ id: folder.id, filename: folder.name, type: 'folder' })),
      ...this.snapshot.playlists
        .filter(playlist => playlist.folderId !== undefined && playlist.folderId === folderId)
        .map((playlist): FolderRow => ({ id: playlist.id, filename: playlist.name, type: 'playlist' })),
      ...this.snapshot.tracks
        .filter(track => track.folderId !== undefined && track.folderId === folderId)
        .map((track): FolderRow => ({ id: track.id, filename: track.filename ?? track.title, type: 'track' })),
    ].sort((a, b) => compareText(a.filename, b.filename));

    return { count: entries.length, folder_loop: page(entries, query) };
  }

  private titles(query: LibraryQuery): LibraryResults {
    const { trackId, albumId, sort, search } = query.params;

    let tracks = this.snapshot.tracks
      .filter(track => trackId === undefined || track.id === trackId)
      .filter(track => albumId === undefined || track.albumId === albumId);

    if (search) {
      const withValues = tracks.map(track => ({ track, values: this.trackValues(track) }));
      const matching = withValues.filter(({ values }) => evaluate(search.predicate, values));
      const order: SortKey[] = search.order.length > 0 ? search.order : [{ property: 'dc:title', direction: 'ASC' }];
      tracks = matching.sort((a, b) => compareBy(order, a.values, b.values)).map(({ track }) => track);
    } else if (sort === 'tracknum') {
      tracks = [...tracks].sort((a, b) => compareNumber(a.trackNumber, b.trackNumber) || compareText(a.title, b.title));
    } else {
      tracks = [...tracks].sort((a, b) => compareText(a.title, b.title));
    }

    const rows = tracks.map(track => this.trackRow(track));
    return { count: rows.length, titles_loop: page(rows, query) };
  }

  // --- וידאו ותמונות ---

  private mediaValues(record: MediaRecord, dateField: 'modifiedTime' | 'takenTime'): RowValues {
    return {
      'dc:title': record.title,
      '@id': record.id,
      'dc:date': record[dateField],
      'pv:modificationTime': record.modifiedTime,
      'pv:addedTime': record.addedTime,
      'pv:lastUpdated': record.updatedTime,
    };
  }

  private searchMedia(records: MediaRecord[], query: LibraryQuery, dateField: 'modifiedTime' | 'takenTime'): MediaRecord[] {
    const { search } = query.params;
    if (!search) {
      return [...records].sort((a, b) => compareText(a.title, b.title));
    }
    const order: SortKey[] = search.order.length > 0 ? search.order : [{ property: 'dc:title', direction: 'ASC' }];
    return records
      .map(record => ({ record, values: this.mediaValues(record, dateField) }))
      .filter(({ values }) => evaluate(search.predicate, values))
      .sort((a, b) => compareBy(order, a.values, b.values))
      .map(({ record }) => record);
  }

  private videos(query: LibraryQuery): LibraryResults {
    const { videoId } = query.params;
    const videos: VideoRow[] = this.searchMedia(
      this.snapshot.videos.filter(video => videoId === undefined || video.id === videoId),
      query,
      'modifiedTime',
    ).map(video => ({
      id: video.id,
      title: video.title,
      album: video.album,
      duration: video.duration,
      width: video.width,
      height: video.height,
      fileSize: video.fileSize,
      mimeType: video.mimeType,
      modifiedTime: video.modifiedTime,
      updatedTime: video.updatedTime,
    }));
    return { count: videos.length, videos_loop: page(videos, query) };
  }

  private imageRow(image: MediaRecord): ImageRow {
    return {
      id: image.id,
      title: image.title,
      album: image.album,
      width: image.width,
      height: image.height,
      fileSize: image.fileSize,
      mimeType: image.mimeType,
      takenTime: image.takenTime,
      updatedTime: image.updatedTime,
    };
  }

  private images(query: LibraryQuery): LibraryResults {
    const { imageId, imageAlbums, imageAlbumId, timeline, timelineYear, timelineMonth, timelineDay } = query.params;
    const all = this.snapshot.images;
    const result = (rows: ImageRow[]): LibraryResults => ({ count: rows.length, images_loop: page(rows, query) });
    const containers = (keys: Map<string, string>): ImageRow[] =>
      [...keys.entries()].sort(([a], [b]) => compareText(a, b)).map(([id, title]) => ({ id, title }));

    if (imageId !== undefined) {
      return result(all.filter(image => image.id === imageId).map(image => this.imageRow(image)));
    }

    if (imageAlbums) {
      const albums = new Map<string, string>();
      for (const image of all) {
        if (image.album && (imageAlbumId === undefined || encodeURIComponent(image.album) === imageAlbumId)) {
          albums.set(encodeURIComponent(image.album), image.album);
        }
      }
      return result(containers(albums));
    }

    if (imageAlbumId !== undefined) {
      const inAlbum = all.filter(image => image.album !== undefined && encodeURIComponent(image.album) === imageAlbumId);
      return result(this.searchMedia(inAlbum, query, 'takenTime').map(image => this.imageRow(image)));
    }

    if (timeline) {
      const dated = all
        .filter((image): image is MediaRecord & { takenTime: number } => image.takenTime !== undefined)
        .map(image => ({ image, date: datePartsOf(image.takenTime) }))
        .filter(({ date }) =>
          (timelineYear === undefined || date.year === timelineYear) &&
          (timelineMonth === undefined || date.month === timelineMonth) &&
          (timelineDay === undefined || date.day === timelineDay));

      if (timeline === 'day') {
        return result(this.searchMedia(dated.map(({ image }) => image), query, 'takenTime').map(image => this.imageRow(image)));
      }

      const levels = new Map<string, string>();
      for (const { date } of dated) {
        switch (timeline) {
          case 'years':
            levels.set(date.year, date.year);
            break;
          case 'months':
            levels.set(date.month, date.month);
            break;
          case 'days':
            levels.set(date.day, date.day);
            break;
          case 'dates':
            levels.set(`${date.year}/${date.month}/${date.day}`, `${date.year}-${date.month}-${date.day}`);
            break;
        }
      }
      return result(containers(levels));
    }

    return result(this.searchMedia(all, query, 'takenTime').map(image => this.imageRow(image)));
  }
}
