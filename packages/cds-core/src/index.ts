// From contentDirectoryService.ts
export {
  ContentDirectoryService,
  SEARCH_CAPABILITIES,
  SORT_CAPABILITIES,
} from './contentDirectoryService';
export type { BrowseRequest, SearchRequest } from './contentDirectoryService';

// From logger.ts
export {
  default as createLogger,
  createModuleLogger,
} from './logger';
export type { ModuleLogger } from './logger';

// From types.ts
export * from './types';

// From errors.ts
export * from './errors';

// From objectId.ts
export {
  parseObjectId,
  formatObjectId,
  parentIdOf,
  childIdOf,
  ROOT_ID,
} from './objectId';
export type { ObjectPath, InvalidPath, LibraryPath, PathKey } from './objectId';

// From criteria.ts
export { decodeSearchCriteria, decodeSortCriteria } from './criteria';

// From systemUpdateNotifier.ts
export {
  SystemUpdateNotifier,
  createContentDirectoryState,
  EVENT_RATE,
} from './systemUpdateNotifier';
export type { ContentDirectoryState, EventPublisher, EventVariables } from './systemUpdateNotifier';

// From inMemoryLibrary.ts
export {
  InMemoryLibrary,
  parseLibrarySnapshot,
  emptySnapshot,
} from './inMemoryLibrary';
export type { LibrarySnapshot } from './inMemoryLibrary';
