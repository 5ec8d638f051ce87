import { decodeSearchCriteria, decodeSortCriteria, type SearchFamily } from './criteria';
import { renderLibraryResults, renderMenu, type NodeContext } from './didlLiteRenderer';
import {
  CannotProcessRequestError,
  InvalidArgsError,
  InvalidSearchCriteriaError,
  NoSuchObjectError,
} from './errors';
import { createModuleLogger } from './logger';
import { parentIdOf, parseObjectId, type ObjectPath } from './objectId';
import { translateBrowse, type QueryTranslation, type RowKind } from './queryTranslator';
import type { SystemUpdateNotifier } from './systemUpdateNotifier';
import {
  BrowseFlag,
  type BrowseResult,
  type ContentDirectoryOptions,
  type LibraryBackend,
  type LibraryQuery,
  type LibraryResults,
  type PageWindow,
} from './types';

export const SEARCH_CAPABILITIES = 'dc:title,dc:creator,upnp:artist,upnp:album,upnp:genre';
export const SORT_CAPABILITIES = 'dc:title,dc:creator,dc:date,upnp:artist,upnp:album,upnp:genre,upnp:originalTrackNumber';

// תגיות שנטענות תמיד בחיפוש; בלי A ו-G שמריצים שאילתות נוספות
const SEARCH_BASE_TAGS = 'agldyorfTIctnDU';

export interface BrowseRequest {
  objectId: string;
  browseFlag: string;
  filter: string;
  startingIndex: number;
  requestedCount: number;
  sortCriteria: string;
}

export interface SearchRequest {
  containerId: string;
  searchCriteria: string;
  filter: string;
  startingIndex: number;
  requestedCount: number;
  sortCriteria: string;
}

const isBrowseFlag = (value: string): value is BrowseFlag =>
  value === BrowseFlag.BrowseMetadata || value === BrowseFlag.BrowseDirectChildren;

/**
 * @hebrew RequestedCount של 0 פירושו "ללא הגבלה".
 */
function toPageWindow(startingIndex: number, requestedCount: number): PageWindow {
  if (!Number.isInteger(startingIndex) || startingIndex < 0 || !Number.isInteger(requestedCount) || requestedCount < 0) {
    throw new InvalidArgsError('StartingIndex and RequestedCount must be non-negative integers');
  }
  return { start: startingIndex, limit: requestedCount === 0 ? Number.MAX_SAFE_INTEGER : requestedCount };
}

const SEARCH_ROW_KIND: Record<SearchFamily['command'], RowKind> = {
  titles: 'track',
  video_titles: 'video',
  image_titles: 'image',
};

// תוצאות חיפוש תלויות תחת נקודת העגינה של הטבלה, כך שה-id שלהן ניתן לעיון
const SEARCH_PARENT: Record<SearchFamily['table'], { path: ObjectPath; id: string }> = {
  tracks: { path: { kind: 'library', mount: 't', keys: [], listing: 't' }, id: '/t' },
  videos: { path: { kind: 'video', videoId: null }, id: '/va' },
  images: { path: { kind: 'image', imageId: null }, id: '/ia' },
};

/**
 * @class ContentDirectoryService
 * @description מימוש פעולות שירות ה-ContentDirectory של UPnP מעל LibraryBackend.
 * זורק UpnpActionError (עם קוד UPnP) עבור כל תקלה שמוחזרת ללקוח.
 */
export class ContentDirectoryService {
  private readonly logger = createModuleLogger('ContentDirectoryService');

  constructor(
    private readonly backend: LibraryBackend,
    private readonly notifier: SystemUpdateNotifier,
    private readonly options: ContentDirectoryOptions,
  ) {}

  getSearchCapabilities(): string {
    return SEARCH_CAPABILITIES;
  }

  getSortCapabilities(): string {
    return SORT_CAPABILITIES;
  }

  getSystemUpdateId(): number {
    return this.notifier.state.systemUpdateId;
  }

  /**
   * @hebrew פעולת Browse: ניתוח ObjectID → תרגום לשאילתה → backend → DIDL-Lite.
   * @throws CannotProcessRequestError (720) עבור BrowseFlag לא תקין או כשל backend.
   * @throws NoSuchObjectError (701) עבור מזהה שלא קיים בהיררכיה.
   */
  async browse(request: BrowseRequest): Promise<BrowseResult> {
    const { objectId, browseFlag, filter, sortCriteria } = request;

    if (!isBrowseFlag(browseFlag)) {
      throw new CannotProcessRequestError('invalid BrowseFlag');
    }
    const page = toPageWindow(request.startingIndex, request.requestedCount);

    const path = parseObjectId(objectId);
    if (path.kind === 'invalid') {
      this.logger.debug(`Browse: invalid object id ${objectId}: ${path.reason}`);
      throw new NoSuchObjectError();
    }

    const translation = translateBrowse(path, browseFlag, page, sortCriteria, this.options);
    this.logger.debug(`Browse ${objectId} ${browseFlag} start=${request.startingIndex} count=${request.requestedCount} → ${translation.kind}`);

    switch (translation.kind) {
      case 'noSuchObject':
        this.logger.debug(`Browse: ${objectId}: ${translation.reason}`);
        throw new NoSuchObjectError();

      case 'empty':
        return this.result('', 0, 0);

      case 'menu': {
        const { xml, count, total } = renderMenu(translation.entries, sortCriteria, translation.page);
        return this.result(xml, count, total);
      }

      case 'query': {
        const results = await this.execute(translation.query, message => new CannotProcessRequestError(message));
        const context: NodeContext = browseFlag === BrowseFlag.BrowseMetadata
          ? { mode: 'metadata', id: objectId, parentId: parentIdOf(path) }
          : { mode: 'children', parent: path, parentId: objectId };
        return this.render(translation, results, context, filter);
      }
    }
  }

  /**
   * @hebrew פעולת Search. נתמך רק חיפוש מהשורש (ContainerID "0").
   * @throws InvalidSearchCriteriaError (708) עבור קריטריון חיפוש/מיון שלא ניתן למפות.
   */
  async search(request: SearchRequest): Promise<BrowseResult> {
    const { containerId, filter, sortCriteria } = request;

    if (containerId !== '0') {
      throw new InvalidSearchCriteriaError('Unsupported or invalid search criteria (only ContainerID 0 is supported)');
    }
    const page = toPageWindow(request.startingIndex, request.requestedCount);

    const decoded = decodeSearchCriteria(request.searchCriteria || '*');
    if (decoded.kind === 'unsupported') {
      this.logger.debug(`Search: unsupported criteria '${request.searchCriteria}': ${decoded.reason}`);
      throw new InvalidSearchCriteriaError();
    }

    const sort = decodeSortCriteria(sortCriteria, decoded.family.table);
    if (sortCriteria.trim() !== '' && sort.orderSql === '') {
      throw new InvalidSearchCriteriaError('Unsupported or invalid sort criteria');
    }

    const query: LibraryQuery = {
      command: decoded.family.command,
      start: page.start,
      limit: page.limit,
      params: {
        search: { sql: decoded.sql, predicate: decoded.predicate, orderSql: sort.orderSql, order: sort.keys },
      },
      tags: decoded.tags + sort.tags + SEARCH_BASE_TAGS,
    };
    this.logger.info(`Search: ${query.command} where (${decoded.sql})${sort.orderSql ? ` order by ${sort.orderSql}` : ''}`);

    const results = await this.execute(query, () => new InvalidSearchCriteriaError());
    const parent = SEARCH_PARENT[decoded.family.table];
    const translation: QueryTranslation = { kind: 'query', query, rowKind: SEARCH_ROW_KIND[decoded.family.command] };
    return this.render(translation, results, { mode: 'children', parent: parent.path, parentId: parent.id }, filter);
  }

  private async execute(query: LibraryQuery, toFault: (message: string) => Error): Promise<LibraryResults> {
    try {
      return await this.backend.execute(query);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Library query ${query.command} failed: ${message}`);
      throw toFault(message);
    }
  }

  private async render(
    translation: QueryTranslation,
    results: LibraryResults,
    context: NodeContext,
    filter: string,
  ): Promise<BrowseResult> {
    const { xml, count, total } = await renderLibraryResults({
      translation,
      results,
      context,
      filter,
      backend: this.backend,
      options: { baseUrl: this.options.baseUrl },
    });
    return this.result(xml, count, total);
  }

  private result(result: string, numberReturned: number, totalMatches: number): BrowseResult {
    return { result, numberReturned, totalMatches, updateId: this.getSystemUpdateId() };
  }
}
