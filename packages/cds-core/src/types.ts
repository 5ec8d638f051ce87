// קובץ זה מכיל את הגדרות הטיפוסים של שירות ה-ContentDirectory ושל ממשק ה-backend.

/**
 * @hebrew דגל ה-Browse של UPnP.
 */
export enum BrowseFlag {
  BrowseMetadata = 'BrowseMetadata',
  BrowseDirectChildren = 'BrowseDirectChildren',
}

/**
 * @hebrew חלון דפדוף: אינדקס התחלה ומספר פריטים מבוקש.
 */
export interface PageWindow {
  start: number;
  limit: number;
}

/**
 * @hebrew התוצאה שמוחזרת מ-Browse ומ-Search (לפני עטיפת SOAP).
 */
export interface BrowseResult {
  /** @hebrew מחרוזת DIDL-Lite, או מחרוזת ריקה כשלא הוחזרו צמתים. */
  result: string;
  numberReturned: number;
  totalMatches: number;
  updateId: number;
}

// --- ממשק ה-backend ---

/**
 * @hebrew שמות השאילתות שה-backend יודע לבצע.
 */
export type LibraryCommand =
  | 'artists'
  | 'albums'
  | 'genres'
  | 'years'
  | 'musicfolder'
  | 'titles'
  | 'playlists'
  | 'playlisttracks'
  | 'video_titles'
  | 'image_titles';

export type TimelineLevel = 'years' | 'months' | 'days' | 'dates' | 'day';

/**
 * @hebrew פרמטרי סינון ומיון של שאילתת ספרייה.
 * כל השדות אופציונליים; כל שאילתה משתמשת רק בחלק מהם.
 */
export interface LibraryQueryParams {
  artistId?: number;
  albumId?: number;
  genreId?: number;
  trackId?: number;
  year?: number;
  folderId?: number;
  playlistId?: number;
  /** @hebrew מחזיר את התיקייה עצמה במקום את תוכנה. */
  returnTop?: boolean;
  /** @hebrew סדר המיון הטבעי של השאילתה. */
  sort?: 'album' | 'new' | 'tracknum';
  videoId?: string;
  imageId?: string;
  /** @hebrew רשימת אלבומי התמונות (כקונטיינרים). */
  imageAlbums?: boolean;
  /** @hebrew מזהה אלבום תמונות (מקודד URI). */
  imageAlbumId?: string;
  timeline?: TimelineLevel;
  timelineYear?: string;
  timelineMonth?: string;
  timelineDay?: string;
  search?: SearchQuery;
}

/**
 * @hebrew חיפוש שפוענח מ-SearchCriteria/SortCriteria.
 * `sql` ו-`orderSql` הם קטעי שפת השאילתות של ה-backend; `predicate` ו-`order`
 * הם אותו מידע כמבנה נתונים עבור backend שמעריך בזיכרון.
 */
export interface SearchQuery {
  sql: string;
  predicate: SearchPredicate;
  orderSql: string;
  order: SortKey[];
}

export interface LibraryQuery {
  command: LibraryCommand;
  start: number;
  limit: number;
  params: LibraryQueryParams;
  /** @hebrew אותיות של עמודות נוספות שיש לטעון (למשל 'a' אמן, 'l' אלבום, 'g' ז'אנר). */
  tags: string;
}

export interface ArtistRow {
  id: number;
  artist: string;
}

export interface AlbumRow {
  id: number;
  album: string;
  artist?: string;
  year?: number;
  artworkTrackId?: number;
}

export interface GenreRow {
  id: number;
  genre: string;
}

export interface YearRow {
  year: number;
}

export type FolderEntryType = 'folder' | 'unknown' | 'playlist' | 'track';

export interface FolderRow {
  id: number;
  filename: string;
  type: FolderEntryType;
}

export interface TrackRow {
  id: number;
  title: string;
  artist?: string;
  album?: string;
  albumId?: number;
  genre?: string;
  year?: number;
  trackNumber?: number;
  /** @hebrew משך בשניות. */
  duration?: number;
  bitrate?: number;
  sampleRate?: number;
  sampleSize?: number;
  channels?: number;
  fileSize?: number;
  contentType?: string;
  artworkTrackId?: number;
  /** @hebrew זמן עדכון אחרון (שניות מאז epoch). */
  updatedTime?: number;
}

export interface PlaylistRow {
  id: number;
  playlist: string;
}

export interface VideoRow {
  id: string;
  title: string;
  album?: string;
  duration?: number;
  width?: number;
  height?: number;
  fileSize?: number;
  mimeType?: string;
  /** @hebrew שניות מאז epoch. */
  modifiedTime?: number;
  updatedTime?: number;
}

/**
 * @hebrew שורת תמונה. עבור שאילתות timeline/אלבומים זו שורת קונטיינר:
 * `id` הוא קטע הנתיב היחסי (למשל "2011/07/03" עבור timeline:dates).
 */
export interface ImageRow {
  id: string;
  title: string;
  album?: string;
  width?: number;
  height?: number;
  fileSize?: number;
  mimeType?: string;
  takenTime?: number;
  updatedTime?: number;
}

export interface LibraryResults {
  count: number;
  artists_loop?: ArtistRow[];
  albums_loop?: AlbumRow[];
  genres_loop?: GenreRow[];
  years_loop?: YearRow[];
  folder_loop?: FolderRow[];
  titles_loop?: TrackRow[];
  playlisttracks_loop?: TrackRow[];
  playlists_loop?: PlaylistRow[];
  videos_loop?: VideoRow[];
  images_loop?: ImageRow[];
}

/**
 * @hebrew ממשק ה-backend של ספריית המדיה. המימוש עצמו מחוץ לתחום הליבה.
 */
export interface LibraryBackend {
  /**
   * @hebrew מריץ שאילתה. זורק LibraryQueryError אם השאילתה נכשלה.
   */
  execute(query: LibraryQuery): Promise<LibraryResults>;
  /**
   * @hebrew שליפה מרוכזת של שירים לפי מזהים. מזהה שלא נמצא פשוט חסר במפה.
   */
  getTracks(trackIds: number[], tags: string): Promise<Map<number, TrackRow>>;
  /**
   * @hebrew זמן סיום הסריקה האחרונה (שניות מאז epoch).
   */
  lastScanTime(): number;
}

// --- חיפוש ומיון ---

export type SearchTable = 'tracks' | 'videos' | 'images';

export type SearchProperty =
  | 'dc:title'
  | 'dc:creator'
  | 'upnp:artist'
  | 'upnp:album'
  | 'upnp:genre'
  | '@id'
  | 'pv:lastUpdated';

export type SearchOperator = 'contains' | 'doesNotContain' | '=' | '!=' | '<' | '<=' | '>' | '>=';

/**
 * @hebrew עץ פרדיקט של חיפוש.
 */
export type SearchPredicate =
  | { kind: 'all' }
  | { kind: 'compare'; property: SearchProperty; operator: SearchOperator; value: string }
  | { kind: 'exists'; property: SearchProperty; exists: boolean }
  | { kind: 'logical'; operator: 'and' | 'or'; left: SearchPredicate; right: SearchPredicate };

export type SortProperty =
  | 'dc:title'
  | 'dc:creator'
  | 'upnp:artist'
  | 'upnp:album'
  | 'upnp:genre'
  | 'upnp:originalTrackNumber'
  | 'dc:date'
  | 'pv:modificationTime'
  | 'pv:addedTime'
  | 'pv:lastUpdated';

export interface SortKey {
  property: SortProperty;
  direction: 'ASC' | 'DESC';
}

// --- אפשרויות ---

export interface ContentDirectoryOptions {
  /** @hebrew כתובת בסיס ציבורית לבניית כתובות res ו-albumArtURI. */
  baseUrl: string;
  /** @hebrew שם השרת שמוצג בקונטיינר השורש. */
  friendlyName: string;
  /** @hebrew מספר האלבומים המקסימלי ברשימת "מוזיקה חדשה". */
  browseAgeLimit: number;
}
