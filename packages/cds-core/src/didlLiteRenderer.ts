import { create } from 'xmlbuilder2';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces';
import { createModuleLogger } from './logger';
import type { MenuEntry } from './menus';
import { childIdOf, type KeyType, type ObjectPath } from './objectId';
import { TRACK_TAGS, type QueryTranslation } from './queryTranslator';
import type {
  AlbumRow,
  ImageRow,
  LibraryBackend,
  LibraryResults,
  PageWindow,
  TrackRow,
  VideoRow,
} from './types';

const logger = createModuleLogger('DidlLiteRenderer');

const DIDL_NAMESPACES = {
  'xmlns': 'urn:schemas-upnp-org:metadata-1-0/DIDL-Lite/',
  'xmlns:dc': 'http://purl.org/dc/elements/1.1/',
  'xmlns:upnp': 'urn:schemas-upnp-org:metadata-1-0/upnp/',
  'xmlns:pv': 'http://www.pv.com/pvns/',
};

/**
 * @hebrew ההקשר שממנו נגזרים id ו-parentID של כל צומת.
 * children: הצמתים הם ילדים של `parent`. metadata: צומת יחיד, המזהה שהתקבל.
 */
export type NodeContext =
  | { mode: 'children'; parent: ObjectPath; parentId: string }
  | { mode: 'metadata'; id: string; parentId: string };

export interface RenderOutcome {
  /** @hebrew DIDL-Lite, או מחרוזת ריקה כשלא רונדר אף צומת. */
  xml: string;
  count: number;
  total: number;
}

interface NodeIds {
  id: string;
  parentId: string;
}

// --- Filter ---

export type FieldFilter = (field: string) => boolean;

/**
 * @hebrew "*" מחזיר את כל השדות האופציונליים; אחרת שייכות מדויקת לרשימה מופרדת בפסיקים.
 */
export function parseFilter(filter: string): FieldFilter {
  if (filter.trim() === '*') {
    return () => true;
  }
  const fields = new Set(filter.split(',').map(field => field.trim()).filter(field => field));
  return field => fields.has(field);
}

// --- עזרי פורמט ---

/**
 * @hebrew שניות למחרוזת H:MM:SS.mmm (פורמט res@duration).
 */
export function secondsToHms(seconds: number): string {
  const totalMs = Math.round(seconds * 1000);
  const hours = Math.floor(totalMs / 3600000);
  const minutes = Math.floor((totalMs % 3600000) / 60000);
  const secs = Math.floor((totalMs % 60000) / 1000);
  const ms = totalMs % 1000;
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  return `${hours}:${pad(minutes)}:${pad(secs)}.${pad(ms, 3)}`;
}

const epochToDate = (seconds: number): string => new Date(seconds * 1000).toISOString().slice(0, 10);

const protocolInfo = (mimeType: string): string => `http-get:*:${mimeType}:*`;

// --- מסמך DIDL ---

class DidlDocument {
  private readonly root: XMLBuilder;
  count = 0;

  constructor() {
    this.root = create({ version: '1.0', encoding: 'UTF-8' }).ele('DIDL-Lite', DIDL_NAMESPACES);
  }

  container(ids: NodeIds, upnpClass: string, title: string, extraAttributes: Record<string, string> = {}): XMLBuilder {
    this.count++;
    return this.root
      .ele('container', { id: ids.id, parentID: ids.parentId, restricted: '1', ...extraAttributes })
      .ele('upnp:class').txt(upnpClass).up()
      .ele('dc:title').txt(title).up();
  }

  item(ids: NodeIds, upnpClass: string, title: string): XMLBuilder {
    this.count++;
    return this.root
      .ele('item', { id: ids.id, parentID: ids.parentId, restricted: '1' })
      .ele('upnp:class').txt(upnpClass).up()
      .ele('dc:title').txt(title).up();
  }

  toString(): string {
    return this.count === 0 ? '' : this.root.end({ prettyPrint: false, headless: true });
  }
}

// מוסיף אלמנט טקסט רק אם השדה עבר את ה-filter ויש לו ערך
function optional(node: XMLBuilder, include: FieldFilter, field: string, value: string | number | undefined): void {
  if (value !== undefined && value !== '' && include(field)) {
    node.ele(field).txt(String(value)).up();
  }
}

function resource(
  node: XMLBuilder,
  include: FieldFilter,
  url: string,
  mimeType: string,
  attributes: Record<string, string | number | undefined>,
): void {
  const resAttributes: Record<string, string> = { protocolInfo: protocolInfo(mimeType) };
  for (const [name, value] of Object.entries(attributes)) {
    if (value !== undefined && include(`res@${name}`)) {
      resAttributes[name] = String(value);
    }
  }
  node.ele('res', resAttributes).txt(url).up();
}

// --- תבניות לפי סוג שורה ---

export interface RendererOptions {
  baseUrl: string;
}

function renderAlbum(doc: DidlDocument, ids: NodeIds, album: AlbumRow, include: FieldFilter, options: RendererOptions): void {
  const node = doc.container(ids, 'object.container.album.musicAlbum', album.album);
  optional(node, include, 'dc:creator', album.artist);
  optional(node, include, 'upnp:artist', album.artist);
  optional(node, include, 'dc:date', album.year ? `${album.year}-01-01` : undefined);
  optional(
    node,
    include,
    'upnp:albumArtURI',
    album.artworkTrackId !== undefined ? `${options.baseUrl}/music/${album.artworkTrackId}/cover` : undefined,
  );
}

/**
 * @hebrew פריט שיר. res תמיד מופיע; מאפייני res כפופים ל-filter (res@duration וכו').
 */
function renderTrack(doc: DidlDocument, ids: NodeIds, track: TrackRow, include: FieldFilter, options: RendererOptions): void {
  const node = doc.item(ids, 'object.item.audioItem.musicTrack', track.title);
  optional(node, include, 'dc:creator', track.artist);
  optional(node, include, 'upnp:artist', track.artist);
  optional(node, include, 'upnp:album', track.album);
  optional(node, include, 'upnp:genre', track.genre);
  optional(node, include, 'upnp:originalTrackNumber', track.trackNumber);
  optional(node, include, 'dc:date', track.year ? `${track.year}-01-01` : undefined);
  optional(node, include, 'upnp:albumArtURI', `${options.baseUrl}/music/${track.artworkTrackId ?? track.id}/cover`);
  resource(node, include, `${options.baseUrl}/music/${track.id}/download`, track.contentType ?? 'audio/mpeg', {
    duration: track.duration !== undefined ? secondsToHms(track.duration) : undefined,
    size: track.fileSize,
    // bitrate של UPnP הוא בבתים לשנייה
    bitrate: track.bitrate !== undefined ? Math.round(track.bitrate / 8) : undefined,
    sampleFrequency: track.sampleRate,
    bitsPerSample: track.sampleSize,
    nrAudioChannels: track.channels,
  });
}

function renderVideo(doc: DidlDocument, ids: NodeIds, video: VideoRow, include: FieldFilter, options: RendererOptions): void {
  const node = doc.item(ids, 'object.item.videoItem', video.title);
  optional(node, include, 'upnp:album', video.album);
  optional(node, include, 'dc:date', video.modifiedTime !== undefined ? epochToDate(video.modifiedTime) : undefined);
  optional(node, include, 'upnp:albumArtURI', `${options.baseUrl}/video/${video.id}/cover_300x300_o`);
  resource(node, include, `${options.baseUrl}/video/${video.id}/download`, video.mimeType ?? 'video/mp4', {
    duration: video.duration !== undefined ? secondsToHms(video.duration) : undefined,
    size: video.fileSize,
    resolution: video.width && video.height ? `${video.width}x${video.height}` : undefined,
  });
}

function renderImage(doc: DidlDocument, ids: NodeIds, image: ImageRow, include: FieldFilter, options: RendererOptions): void {
  const node = doc.item(ids, 'object.item.imageItem.photo', image.title);
  optional(node, include, 'upnp:album', image.album);
  optional(node, include, 'dc:date', image.takenTime !== undefined ? epochToDate(image.takenTime) : undefined);
  optional(node, include, 'upnp:albumArtURI', `${options.baseUrl}/image/${image.id}/cover_300x300_o`);
  resource(node, include, `${options.baseUrl}/image/${image.id}/download`, image.mimeType ?? 'image/jpeg', {
    size: image.fileSize,
    resolution: image.width && image.height ? `${image.width}x${image.height}` : undefined,
  });
}

// --- מזהים ---

/**
 * @hebrew id ו-parentID של צומת. ילד של צומת ספרייה מקבל מפתח וסיומת (/g → /g/12/a);
 * ילד של צומת וידאו/תמונות מקבל את המפתח כקטע נוסף (/va → /va/<hash>).
 */
function idsFor(context: NodeContext, key: number | string, keyType?: KeyType, childListing?: KeyType | null): NodeIds {
  if (context.mode === 'metadata') {
    return { id: context.id, parentId: context.parentId };
  }
  const { parent, parentId } = context;
  if (parent.kind === 'library' && parent.listing !== null && typeof key === 'number') {
    return { id: childIdOf(parent, { type: keyType ?? parent.listing, id: key }, childListing), parentId };
  }
  return { id: `${parentId}/${key}`, parentId };
}

export interface RenderLibraryArgs {
  translation: QueryTranslation;
  results: LibraryResults;
  context: NodeContext;
  filter: string;
  backend: LibraryBackend;
  options: RendererOptions;
}

/**
 * @hebrew ממיר תוצאות backend ל-DIDL-Lite ומחזיר גם count ו-total.
 * שורות תיקייה שלא ניתן לרנדר (רשימות השמעה, שירים שנמחקו) מורידות את total.
 */
export async function renderLibraryResults(args: RenderLibraryArgs): Promise<RenderOutcome> {
  const { translation, results, context, backend, options } = args;
  const include = parseFilter(args.filter);
  const doc = new DidlDocument();
  let total = results.count;

  switch (translation.rowKind) {
    case 'artist':
      for (const artist of results.artists_loop ?? []) {
        doc.container(idsFor(context, artist.id), 'object.container.person.musicArtist', artist.artist);
      }
      break;

    case 'album':
      for (const album of results.albums_loop ?? []) {
        renderAlbum(doc, idsFor(context, album.id), album, include, options);
      }
      break;

    case 'genre':
      for (const genre of results.genres_loop ?? []) {
        doc.container(idsFor(context, genre.id), 'object.container.genre.musicGenre', genre.genre);
      }
      break;

    case 'year':
      for (const { year } of results.years_loop ?? []) {
        doc.container(idsFor(context, year), 'object.container', year === 0 ? 'Unknown' : String(year));
      }
      break;

    case 'playlist':
      for (const playlist of results.playlists_loop ?? []) {
        doc.container(idsFor(context, playlist.id), 'object.container.playlistContainer', playlist.playlist);
      }
      break;

    case 'folder': {
      const trackIds: number[] = [];
      for (const entry of results.folder_loop ?? []) {
        switch (entry.type) {
          case 'folder':
          case 'unknown':
            doc.container(idsFor(context, entry.id, 'm'), 'object.container.storageFolder', entry.filename);
            break;
          case 'playlist':
            logger.warn(`Skipping playlist entry in music folder: ${entry.filename} (${entry.id})`);
            total--;
            break;
          case 'track':
            trackIds.push(entry.id);
            total--;
            break;
        }
      }

      if (trackIds.length > 0) {
        const tracks = await backend.getTracks(trackIds, TRACK_TAGS);
        for (const trackId of trackIds) {
          const track = tracks.get(trackId);
          if (!track) {
            logger.debug(`Track ${trackId} listed in folder no longer exists`);
            continue;
          }
          total++;
          renderTrack(doc, idsFor(context, trackId, 't', null), track, include, options);
        }
      }
      break;
    }

    case 'track':
      for (const track of results.titles_loop ?? results.playlisttracks_loop ?? []) {
        renderTrack(doc, idsFor(context, track.id), track, include, options);
      }
      break;

    case 'video':
      for (const video of results.videos_loop ?? []) {
        renderVideo(doc, idsFor(context, video.id), video, include, options);
      }
      break;

    case 'imageContainer':
      for (const image of results.images_loop ?? []) {
        doc.container(idsFor(context, image.id), 'object.container', image.title);
      }
      break;

    case 'image':
      for (const image of results.images_loop ?? []) {
        renderImage(doc, idsFor(context, image.id), image, include, options);
      }
      break;
  }

  if (translation.totalCap !== undefined && translation.totalCap < total) {
    total = translation.totalCap;
  }

  return { xml: doc.toString(), count: doc.count, total };
}

/**
 * @hebrew מרנדר תפריט סטטי. מיון לפי dc:title בלבד; limit של 0 פירושו הכל.
 */
export function renderMenu(entries: readonly MenuEntry[], sort: string, page: PageWindow): RenderOutcome {
  const doc = new DidlDocument();
  const sortMatch = /([+-])dc:title/.exec(sort);

  const sorted = [...entries];
  if (sortMatch) {
    const direction = sortMatch[1] === '+' ? 1 : -1;
    sorted.sort((a, b) => direction * (a.title < b.title ? -1 : a.title > b.title ? 1 : 0));
  }

  const end = page.limit === 0 ? sorted.length : page.start + page.limit;
  for (const entry of sorted.slice(page.start, end)) {
    doc.container({ id: entry.id, parentId: entry.parentID }, entry.type, entry.title, {
      searchable: entry.searchable ? '1' : '0',
    });
  }

  return { xml: doc.toString(), count: doc.count, total: sorted.length };
}
