// ניתוח ובנייה של מזהי אובייקטים (ObjectID) במרחב השמות הוירטואלי של ה-ContentDirectory.
//
// Music (/music)
//   Artists       /a  → /a/<id>/l → /a/<id>/l/<id>/t → /a/<id>/l/<id>/t/<id>
//   Albums        /l  → /l/<id>/t → /l/<id>/t/<id>
//   Genres        /g  → /g/<id>/a → /g/<id>/a/<id>/l → /g/<id>/a/<id>/l/<id>/t → .../t/<id>
//   Years         /y  → /y/<year>/l → /y/<year>/l/<id>/t → .../t/<id>
//   New Music     /n  → /n/<id>/t → /n/<id>/t/<id>
//   Music Folder  /m  → /m/<id>/m → /m/<id>/m/<id>/m ... tracks: <folder>/t/<id>
//   Playlists     /p  → /p/<id>/t → /p/<id>/t/<id>
//   Tracks        /t/<id> (cannot be browsed)
// Video (/video)
//   All Videos    /va → /va/<hash>
// Images (/images)
//   All Pictures  /ia → /ia/<hash>
//   Albums        /il → /il/<album> → /il/<album>/<image>
//   By Year       /it → /it/2011 → /it/2011/07 → /it/2011/07/03 → /it/2011/07/03/<image>
//   By Date       /id → /id/2011/07/03 → /id/2011/07/03/<image>

export type LibraryMount = 'a' | 'l' | 'g' | 'y' | 'n' | 'm' | 'p' | 't';

/** @hebrew סוג מפתח בנתיב. אותן אותיות כמו נקודות העגינה של המוזיקה. */
export type KeyType = LibraryMount;

export type MenuId = 'music' | 'video' | 'images';

export type TimelineMount = 'it' | 'id';

export interface PathKey {
  type: KeyType;
  id: number;
}

/**
 * @hebrew נתיב בספריית המוזיקה.
 * `listing` הוא סוג הילדים שהצומת מציג; null עבור עלה (שיר).
 * `/g` → keys [], listing 'g'; `/g/12/a/7/l` → keys [g:12, a:7], listing 'l'.
 */
export interface LibraryPath {
  kind: 'library';
  mount: LibraryMount;
  keys: PathKey[];
  listing: KeyType | null;
}

export interface TimelinePath {
  kind: 'timeline';
  mount: TimelineMount;
  year: string | null;
  month: string | null;
  day: string | null;
  imageId: string | null;
}

export type ObjectPath =
  | { kind: 'root' }
  | { kind: 'menu'; menu: MenuId }
  | LibraryPath
  | { kind: 'video'; videoId: string | null }
  | { kind: 'image'; imageId: string | null }
  | { kind: 'imageAlbum'; albumId: string | null; imageId: string | null }
  | TimelinePath;

export interface InvalidPath {
  kind: 'invalid';
  objectId: string;
  reason: string;
}

export const ROOT_ID = '0';

const LIBRARY_MOUNTS: readonly LibraryMount[] = ['a', 'l', 'g', 'y', 'n', 'm', 'p', 't'];
const MENUS: readonly MenuId[] = ['music', 'video', 'images'];

/**
 * @hebrew סוג הילדים של כל סוג מפתח. שיר ('t') הוא עלה.
 */
export const CHILD_LISTING: Readonly<Record<KeyType, KeyType | null>> = {
  a: 'l',
  l: 't',
  g: 'a',
  y: 'l',
  n: 't',
  m: 'm',
  p: 't',
  t: null,
};

const HASH_PATTERN = /^[0-9a-f]{8}$/;
const NUMERIC_PATTERN = /^\d+$/;

const isLibraryMount = (token: string): token is LibraryMount =>
  (LIBRARY_MOUNTS as readonly string[]).includes(token);

const isMenu = (token: string): token is MenuId =>
  (MENUS as readonly string[]).includes(token);

const isNumericId = (token: string): boolean =>
  NUMERIC_PATTERN.test(token) && Number.isSafeInteger(Number(token));

const invalid = (objectId: string, reason: string): InvalidPath => ({ kind: 'invalid', objectId, reason });

function parseLibraryPath(objectId: string, mount: LibraryMount, rest: string[]): LibraryPath | InvalidPath {
  const keys: PathKey[] = [];

  if (rest.length === 0) {
    return { kind: 'library', mount, keys, listing: mount };
  }

  let index = 0;
  // מזהה מיד אחרי נקודת העגינה שייך לנקודת העגינה עצמה (/g/12)
  if (isNumericId(rest[0])) {
    keys.push({ type: mount, id: Number(rest[0]) });
    index = 1;
  }

  let listing: KeyType | null = null;
  while (index < rest.length) {
    const letter = rest[index];
    if (!isLibraryMount(letter)) {
      return invalid(objectId, `unknown path segment '${letter}'`);
    }
    const idToken = rest[index + 1];
    if (idToken === undefined) {
      listing = letter;
      break;
    }
    if (!isNumericId(idToken)) {
      return invalid(objectId, `segment '${letter}' expects a numeric key, got '${idToken}'`);
    }
    keys.push({ type: letter, id: Number(idToken) });
    index += 2;
  }

  return { kind: 'library', mount, keys, listing };
}

function parseTimelinePath(objectId: string, mount: TimelineMount, rest: string[]): TimelinePath | InvalidPath {
  if (rest.length > 4) {
    return invalid(objectId, 'timeline path is too deep');
  }
  // /id מציג ימים ישירות, בלי רמות שנה וחודש
  if (mount === 'id' && (rest.length === 1 || rest.length === 2)) {
    return invalid(objectId, '/id paths need a full yyyy/mm/dd date');
  }
  const [year = null, month = null, day = null, imageId = null] = rest;
  for (const component of [year, month, day]) {
    if (component !== null && !NUMERIC_PATTERN.test(component)) {
      return invalid(objectId, `timeline component '${component}' is not numeric`);
    }
  }
  return { kind: 'timeline', mount, year, month, day, imageId };
}

/**
 * @hebrew מנתח ObjectID למבנה מוקלד. הניתוח תחבירי בלבד, ללא גישה ל-backend.
 * @param objectId - המזהה כפי שהתקבל מהלקוח.
 * @returns ObjectPath, או InvalidPath אם המזהה לא תואם לאף נקודת עגינה.
 */
export function parseObjectId(objectId: string): ObjectPath | InvalidPath {
  if (objectId === ROOT_ID) {
    return { kind: 'root' };
  }
  if (!objectId.startsWith('/')) {
    return invalid(objectId, 'object id must be "0" or start with "/"');
  }

  const tokens = objectId.slice(1).split('/');
  if (tokens.some(token => token === '')) {
    return invalid(objectId, 'empty path segment');
  }

  const [mount, ...rest] = tokens;

  if (isMenu(mount)) {
    return rest.length === 0 ? { kind: 'menu', menu: mount } : invalid(objectId, 'menus have no children paths');
  }

  if (isLibraryMount(mount)) {
    return parseLibraryPath(objectId, mount, rest);
  }

  switch (mount) {
    case 'va':
    case 'ia': {
      if (rest.length > 1) {
        return invalid(objectId, `/${mount} paths have at most one key`);
      }
      const hash = rest[0] ?? null;
      if (hash !== null && !HASH_PATTERN.test(hash)) {
        return invalid(objectId, `'${hash}' is not an 8 digit hex hash`);
      }
      return mount === 'va' ? { kind: 'video', videoId: hash } : { kind: 'image', imageId: hash };
    }
    case 'il': {
      if (rest.length > 2) {
        return invalid(objectId, '/il paths have at most two keys');
      }
      return { kind: 'imageAlbum', albumId: rest[0] ?? null, imageId: rest[1] ?? null };
    }
    case 'it':
    case 'id':
      return parseTimelinePath(objectId, mount, rest);
    default:
      return invalid(objectId, `unknown mount '/${mount}'`);
  }
}

function formatLibraryPath(path: LibraryPath): string {
  let out = `/${path.mount}`;
  path.keys.forEach((key, index) => {
    out += index === 0 && key.type === path.mount ? `/${key.id}` : `/${key.type}/${key.id}`;
  });
  const isMountRoot = path.keys.length === 0 && path.listing === path.mount;
  if (path.listing !== null && !isMountRoot) {
    out += `/${path.listing}`;
  }
  return out;
}

/**
 * @hebrew בונה את מחרוזת ה-ObjectID מנתיב מוקלד. הפעולה ההפוכה ל-parseObjectId.
 */
export function formatObjectId(path: ObjectPath): string {
  switch (path.kind) {
    case 'root':
      return ROOT_ID;
    case 'menu':
      return `/${path.menu}`;
    case 'library':
      return formatLibraryPath(path);
    case 'video':
      return path.videoId ? `/va/${path.videoId}` : '/va';
    case 'image':
      return path.imageId ? `/ia/${path.imageId}` : '/ia';
    case 'imageAlbum':
      return ['/il', path.albumId, path.imageId].filter((part): part is string => part !== null).join('/');
    case 'timeline':
      return [`/${path.mount}`, path.year, path.month, path.day, path.imageId]
        .filter((part): part is string => part !== null)
        .join('/');
  }
}

const MENU_OF_LIBRARY = '/music';

/**
 * @hebrew מחשב את ה-parentID של צומת.
 * צומת רשימה עם מפתחות: מסירים את המפתח האחרון והסיומת (/g/12/a/7/l → /g/12/a).
 * עלה: חוזרים לרשימה שמכילה אותו (/a/5/l/3/t/9 → /a/5/l/3/t, /m/1/t/9 → /m/1/m).
 */
export function parentIdOf(path: ObjectPath): string {
  switch (path.kind) {
    case 'root':
      return '-1';
    case 'menu':
      return ROOT_ID;
    case 'library': {
      const last = path.keys[path.keys.length - 1];
      if (!last) {
        return MENU_OF_LIBRARY;
      }
      const keys = path.keys.slice(0, -1);
      if (path.listing !== null) {
        return formatLibraryPath({ ...path, keys, listing: last.type });
      }
      return formatLibraryPath({ ...path, keys, listing: path.mount === 'm' ? 'm' : 't' });
    }
    case 'video':
      return path.videoId ? '/va' : '/video';
    case 'image':
      return path.imageId ? '/ia' : '/images';
    case 'imageAlbum':
      if (path.imageId) {
        return formatObjectId({ ...path, imageId: null });
      }
      return path.albumId ? '/il' : '/images';
    case 'timeline': {
      const { year, month, day, imageId } = path;
      if (imageId) return formatObjectId({ ...path, imageId: null });
      if (day && path.mount === 'id') return '/id';
      if (day) return formatObjectId({ ...path, day: null });
      if (month) return formatObjectId({ ...path, month: null });
      if (year) return formatObjectId({ ...path, year: null });
      return '/images';
    }
  }
}

/**
 * @hebrew נתיב הילד של צומת ספרייה: מוסיף מפתח, והסיומת נקבעת לפי סוג המפתח.
 * @param listing - סוג הרשימה של הילד; ברירת המחדל לפי CHILD_LISTING.
 */
export function libraryChild(path: LibraryPath, key: PathKey, listing: KeyType | null = CHILD_LISTING[key.type]): LibraryPath {
  return { ...path, keys: [...path.keys, key], listing };
}

export function childIdOf(path: LibraryPath, key: PathKey, listing?: KeyType | null): string {
  return formatLibraryPath(libraryChild(path, key, listing === undefined ? CHILD_LISTING[key.type] : listing));
}
