import { createModuleLogger } from './logger';
import { findMenuEntry, MENUS, ROOT_MENU, rootEntry, type MenuEntry } from './menus';
import type { KeyType, LibraryMount, LibraryPath, ObjectPath, PathKey, TimelinePath } from './objectId';
import { BrowseFlag, type LibraryCommand, type LibraryQuery, type LibraryQueryParams, type PageWindow, type TimelineLevel } from './types';

const logger = createModuleLogger('QueryTranslator');

export const TRACK_TAGS = 'AGldyorfTIctnDU';
export const ALBUM_TAGS = 'alyj';
export const VIDEO_TAGS = 'dorfcwhtnDUl';
export const IMAGE_TAGS = 'ofwhtnDUl';

/**
 * @hebrew סוג השורות שהשאילתה מחזירה, לפיו נבחרת תבנית הרינדור.
 */
export type RowKind =
  | 'artist'
  | 'album'
  | 'genre'
  | 'year'
  | 'folder'
  | 'track'
  | 'playlist'
  | 'video'
  | 'imageContainer'
  | 'image';

export interface MenuTranslation {
  kind: 'menu';
  entries: readonly MenuEntry[];
  page: PageWindow;
}

export interface QueryTranslation {
  kind: 'query';
  query: LibraryQuery;
  rowKind: RowKind;
  /** @hebrew תקרה ל-TotalMatches (רשימת "מוזיקה חדשה"). */
  totalCap?: number;
  /** @hebrew SortCriteria שלא נתמך בצומת ונזנח לטובת הסדר הטבעי. */
  unsupportedSort?: string;
}

export type Translation =
  | MenuTranslation
  | QueryTranslation
  | { kind: 'empty' }
  | { kind: 'noSuchObject'; reason: string };

export interface TranslateOptions {
  friendlyName: string;
  browseAgeLimit: number;
}

// רצף סוגי המפתחות המותר בכל נקודת עגינה
const MOUNT_CHAINS: Readonly<Record<Exclude<LibraryMount, 'm'>, readonly KeyType[]>> = {
  a: ['a', 'l', 't'],
  l: ['l', 't'],
  g: ['g', 'a', 'l', 't'],
  y: ['y', 'l', 't'],
  n: ['n', 't'],
  p: ['p', 't'],
  t: ['t'],
};

const ONE: PageWindow = { start: 0, limit: 1 };

const noSuchObject = (reason: string): Translation => ({ kind: 'noSuchObject', reason });

function menuMetadata(id: string): Translation {
  const item = findMenuEntry(id);
  return item ? { kind: 'menu', entries: [item], page: ONE } : noSuchObject(`${id} has no metadata`);
}

/**
 * @hebrew בודק שרצף המפתחות והסיומת תואמים לנקודת העגינה.
 */
export function isWellFormedLibraryPath(path: LibraryPath): boolean {
  const { mount, keys, listing } = path;

  if (mount === 'm') {
    const folders = listing === null ? keys.slice(0, -1) : keys;
    if (!folders.every(key => key.type === 'm')) return false;
    if (listing === null) return keys[keys.length - 1]?.type === 't';
    return listing === 'm';
  }

  const chain = MOUNT_CHAINS[mount];
  if (!keys.every((key, index) => chain[index] === key.type)) return false;
  if (listing === null) return keys[keys.length - 1]?.type === 't';
  return chain[keys.length] === listing;
}

const keyOf = (keys: PathKey[], type: KeyType): number | undefined => keys.find(key => key.type === type)?.id;

function libraryFilters(keys: PathKey[]): LibraryQueryParams {
  const params: LibraryQueryParams = {};
  const artistId = keyOf(keys, 'a');
  const genreId = keyOf(keys, 'g');
  const year = keyOf(keys, 'y');
  if (artistId !== undefined) params.artistId = artistId;
  if (genreId !== undefined) params.genreId = genreId;
  if (year !== undefined) params.year = year;
  return params;
}

const query = (
  command: LibraryCommand,
  page: PageWindow,
  params: LibraryQueryParams,
  tags: string,
  rowKind: RowKind,
): QueryTranslation => ({
  kind: 'query',
  query: { command, start: page.start, limit: page.limit, params, tags },
  rowKind,
});

/**
 * @hebrew סדר המיון הטבעי של רשימה; null אם הרשימה לא מצהירה על מיון.
 */
export function nativeSortOf(path: LibraryPath): string | null {
  const last = path.keys[path.keys.length - 1];
  switch (path.listing) {
    case 'a':
    case 'l':
    case 'g':
    case 'y':
    case 'm':
    case 'p':
      return '+dc:title';
    case 't':
      return last && (last.type === 'l' || last.type === 'n') ? '+upnp:originalTrackNumber' : null;
    default:
      return null;
  }
}

function listingQuery(path: LibraryPath, listing: KeyType, page: PageWindow, options: TranslateOptions): Translation {
  const { keys } = path;
  const last = keys[keys.length - 1];

  switch (listing) {
    case 'a':
      return query('artists', page, libraryFilters(keys), '', 'artist');
    case 'l':
      return query('albums', page, { ...libraryFilters(keys), sort: 'album' }, ALBUM_TAGS, 'album');
    case 'g':
      return query('genres', page, {}, '', 'genre');
    case 'y':
      return query('years', page, {}, '', 'year');
    case 'p':
      return query('playlists', page, {}, '', 'playlist');
    case 'm':
      return query('musicfolder', page, last ? { folderId: last.id } : {}, '', 'folder');
    case 'n': {
      const cap = options.browseAgeLimit;
      const limit = Math.max(0, Math.min(page.limit, cap - page.start));
      return {
        ...query('albums', { start: page.start, limit }, { sort: 'new' }, ALBUM_TAGS, 'album'),
        totalCap: cap,
      };
    }
    case 't':
      if (last?.type === 'l' || last?.type === 'n') {
        return query('titles', page, { albumId: last.id, sort: 'tracknum' }, TRACK_TAGS, 'track');
      }
      if (last?.type === 'p') {
        return query('playlisttracks', page, { playlistId: last.id }, TRACK_TAGS, 'track');
      }
      if (path.mount === 't' && !last) {
        return query('titles', page, {}, TRACK_TAGS, 'track');
      }
      return noSuchObject('tracks cannot be listed without an album or playlist');
  }
}

function metadataQuery(path: LibraryPath): Translation {
  const { keys } = path;
  const last = keys[keys.length - 1];

  if (!last) {
    return menuMetadata(`/${path.mount}`);
  }

  switch (last.type) {
    case 't':
      return query('titles', ONE, { trackId: last.id }, TRACK_TAGS, 'track');
    case 'a':
      return query('artists', ONE, { ...libraryFilters(keys.slice(0, -1)), artistId: last.id }, '', 'artist');
    case 'l':
    case 'n':
      return query('albums', ONE, { albumId: last.id }, ALBUM_TAGS, 'album');
    case 'g':
      return query('genres', ONE, { genreId: last.id }, '', 'genre');
    case 'y':
      return query('years', ONE, { year: last.id }, '', 'year');
    case 'm':
      return query('musicfolder', ONE, { folderId: last.id, returnTop: true }, '', 'folder');
    case 'p':
      return query('playlists', ONE, { playlistId: last.id }, '', 'playlist');
  }
}

function translateLibrary(path: LibraryPath, flag: BrowseFlag, page: PageWindow, sort: string, options: TranslateOptions): Translation {
  if (!isWellFormedLibraryPath(path)) {
    return noSuchObject('path does not match the mount hierarchy');
  }

  if (flag === BrowseFlag.BrowseMetadata) {
    return metadataQuery(path);
  }

  const { listing } = path;
  if (listing === null) {
    return { kind: 'empty' };
  }
  const translation = listingQuery(path, listing, page, options);
  const native = nativeSortOf(path);
  if (translation.kind === 'query' && sort && native !== null && sort !== native) {
    logger.warn(`Unsupported sort '${sort}' for ${listing} listing, using ${native}`);
    return { ...translation, unsupportedSort: sort };
  }
  return translation;
}

const TIMELINE_CHILD_LEVEL: Record<'root' | 'year' | 'month', TimelineLevel> = {
  root: 'years',
  year: 'months',
  month: 'days',
};

function timelineParams(level: TimelineLevel, path: TimelinePath): LibraryQueryParams {
  const params: LibraryQueryParams = { timeline: level };
  if (path.year) params.timelineYear = path.year;
  if (path.month) params.timelineMonth = path.month;
  if (path.day) params.timelineDay = path.day;
  return params;
}

function translateTimeline(path: TimelinePath, flag: BrowseFlag, page: PageWindow): Translation {
  const metadata = flag === BrowseFlag.BrowseMetadata;
  const { year, month, day, imageId } = path;

  if (imageId) {
    return metadata ? query('image_titles', ONE, { imageId }, IMAGE_TAGS, 'image') : { kind: 'empty' };
  }

  if (!year) {
    if (metadata) {
      return menuMetadata(`/${path.mount}`);
    }
    const level: TimelineLevel = path.mount === 'id' ? 'dates' : TIMELINE_CHILD_LEVEL.root;
    return query('image_titles', page, { timeline: level }, '', 'imageContainer');
  }

  if (year && month && day) {
    if (metadata) {
      const level: TimelineLevel = path.mount === 'id' ? 'dates' : 'days';
      return query('image_titles', ONE, timelineParams(level, path), '', 'imageContainer');
    }
    return query('image_titles', page, timelineParams('day', path), IMAGE_TAGS, 'image');
  }

  // בסיס הנתיב הוא שנה או שנה+חודש: הילדים הם רמת ה-timeline הבאה
  const depth = month ? 'month' : 'year';
  if (metadata) {
    const level: TimelineLevel = depth === 'month' ? 'months' : 'years';
    return query('image_titles', ONE, timelineParams(level, path), '', 'imageContainer');
  }
  return query('image_titles', page, timelineParams(TIMELINE_CHILD_LEVEL[depth], path), '', 'imageContainer');
}

/**
 * @hebrew מתרגם נתיב ודגל Browse לשאילתת backend, לתפריט סטטי, או לתשובה ריקה.
 * @param page - חלון הדפדוף של הלקוח (כבר מנורמל; limit אינו 0).
 * @param sort - SortCriteria הגולמי של הלקוח.
 */
export function translateBrowse(
  path: ObjectPath,
  flag: BrowseFlag,
  page: PageWindow,
  sort: string,
  options: TranslateOptions,
): Translation {
  const metadata = flag === BrowseFlag.BrowseMetadata;

  switch (path.kind) {
    case 'root':
      return metadata
        ? { kind: 'menu', entries: [rootEntry(options.friendlyName)], page: ONE }
        : { kind: 'menu', entries: ROOT_MENU, page };

    case 'menu':
      return metadata ? menuMetadata(`/${path.menu}`) : { kind: 'menu', entries: MENUS[path.menu], page };

    case 'library':
      return translateLibrary(path, flag, page, sort, options);

    case 'video':
      if (path.videoId) {
        return metadata ? query('video_titles', ONE, { videoId: path.videoId }, VIDEO_TAGS, 'video') : { kind: 'empty' };
      }
      return metadata
        ? menuMetadata('/va')
        : query('video_titles', page, {}, VIDEO_TAGS, 'video');

    case 'image':
      if (path.imageId) {
        return metadata ? query('image_titles', ONE, { imageId: path.imageId }, IMAGE_TAGS, 'image') : { kind: 'empty' };
      }
      return metadata
        ? menuMetadata('/ia')
        : query('image_titles', page, {}, IMAGE_TAGS, 'image');

    case 'imageAlbum': {
      const { albumId, imageId } = path;
      if (imageId) {
        return metadata ? query('image_titles', ONE, { imageId }, IMAGE_TAGS, 'image') : { kind: 'empty' };
      }
      if (albumId) {
        return metadata
          ? query('image_titles', ONE, { imageAlbums: true, imageAlbumId: albumId }, '', 'imageContainer')
          : query('image_titles', page, { imageAlbumId: albumId }, IMAGE_TAGS, 'image');
      }
      return metadata
        ? menuMetadata('/il')
        : query('image_titles', page, { imageAlbums: true }, '', 'imageContainer');
    }

    case 'timeline':
      return translateTimeline(path, flag, page);
  }
}
