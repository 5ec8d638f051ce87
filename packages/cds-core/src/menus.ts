import type { MenuId } from './objectId';

/**
 * @hebrew רשומה בתפריט סטטי. מוצגת תמיד כקונטיינר.
 */
export interface MenuEntry {
  id: string;
  parentID: string;
  type: string;
  title: string;
  searchable?: boolean;
}

const CONTAINER = 'object.container';

const entry = (id: string, parentID: string, title: string): MenuEntry => ({ id, parentID, type: CONTAINER, title });

export const ROOT_MENU: readonly MenuEntry[] = [
  entry('/music', '0', 'Music'),
  entry('/images', '0', 'Pictures'),
  entry('/video', '0', 'Video'),
];

export const MUSIC_MENU: readonly MenuEntry[] = [
  entry('/a', '/music', 'Artists'),
  entry('/l', '/music', 'Albums'),
  entry('/g', '/music', 'Genres'),
  entry('/y', '/music', 'Browse by Year'),
  entry('/n', '/music', 'New Music'),
  entry('/m', '/music', 'Browse Music Folder'),
  entry('/p', '/music', 'Playlists'),
];

/**
 * @hebrew הקונטיינר של כל השירים. לא מוצג בתפריט המוזיקה, אבל הוא ה-parentID של תוצאות חיפוש.
 */
export const TRACKS_ENTRY: MenuEntry = entry('/t', '/music', 'Tracks');

export const VIDEO_MENU: readonly MenuEntry[] = [
  entry('/va', '/video', 'All Videos'),
];

export const IMAGES_MENU: readonly MenuEntry[] = [
  entry('/il', '/images', 'Albums'),
  entry('/it', '/images', 'Year'),
  entry('/id', '/images', 'Date'),
  entry('/ia', '/images', 'All Pictures'),
];

export const MENUS: Readonly<Record<MenuId, readonly MenuEntry[]>> = {
  music: MUSIC_MENU,
  video: VIDEO_MENU,
  images: IMAGES_MENU,
};

/**
 * @hebrew רשומת השורש עבור BrowseMetadata על "0".
 */
export const rootEntry = (friendlyName: string): MenuEntry => ({
  id: '0',
  parentID: '-1',
  type: CONTAINER,
  title: friendlyName,
  searchable: true,
});

/**
 * @hebrew מחפש רשומה לפי מזהה בכל התפריטים.
 */
export function findMenuEntry(id: string): MenuEntry | undefined {
  return [...ROOT_MENU, ...MUSIC_MENU, TRACKS_ENTRY, ...VIDEO_MENU, ...IMAGES_MENU].find(item => item.id === id);
}
