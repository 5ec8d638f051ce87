import { createModuleLogger } from './logger';
import type { SearchOperator, SearchPredicate, SearchProperty, SearchTable, SortKey, SortProperty } from './types';

// פענוח SearchCriteria ו-SortCriteria של UPnP לקטעי שאילתה של ה-backend.
// דקדוק נתמך:
//   searchExp := andExp ('or' andExp)*
//   andExp    := relExp ('and' relExp)*
//   relExp    := '(' searchExp ')' | property operator value | '*'

const logger = createModuleLogger('Criteria');

export type SearchCommand = 'titles' | 'video_titles' | 'image_titles';

export interface SearchFamily {
  command: SearchCommand;
  table: SearchTable;
  idColumn: 'id' | 'hash';
}

export const TRACK_FAMILY: SearchFamily = { command: 'titles', table: 'tracks', idColumn: 'id' };
const VIDEO_FAMILY: SearchFamily = { command: 'video_titles', table: 'videos', idColumn: 'hash' };
const IMAGE_FAMILY: SearchFamily = { command: 'image_titles', table: 'images', idColumn: 'hash' };

export interface SearchDecoding {
  kind: 'search';
  family: SearchFamily;
  /** @hebrew פרדיקט בשפת השאילתות של ה-backend. */
  sql: string;
  predicate: SearchPredicate;
  /** @hebrew עמודות נוספות שיש לטעון כדי לספק את הפרדיקט. */
  tags: string;
}

export interface Unsupported {
  kind: 'unsupported';
  reason: string;
}

export interface SortDecoding {
  orderSql: string;
  tags: string;
  keys: SortKey[];
}

// --- טוקנייזר ---

type Token =
  | { type: 'lparen' }
  | { type: 'rparen' }
  | { type: 'string'; value: string }
  | { type: 'operator'; value: string }
  | { type: 'word'; value: string };

class CriteriaSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CriteriaSyntaxError';
  }
}

const OPERATOR_CHARS = '=!<>';
const COMPARISON_OPERATORS: readonly string[] = ['=', '!=', '<', '<=', '>', '>='];

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (/\s/.test(ch)) {
      i++;
    } else if (ch === '(') {
      tokens.push({ type: 'lparen' });
      i++;
    } else if (ch === ')') {
      tokens.push({ type: 'rparen' });
      i++;
    } else if (ch === '"') {
      let value = '';
      i++;
      while (i < input.length && input[i] !== '"') {
        // \" ו-\\ הם תווי escape בתוך מחרוזת
        if (input[i] === '\\' && i + 1 < input.length) {
          i++;
        }
        value += input[i];
        i++;
      }
      if (i >= input.length) {
        throw new CriteriaSyntaxError('unterminated string literal');
      }
      i++;
      tokens.push({ type: 'string', value });
    } else if (OPERATOR_CHARS.includes(ch)) {
      let value = '';
      while (i < input.length && OPERATOR_CHARS.includes(input[i])) {
        value += input[i];
        i++;
      }
      tokens.push({ type: 'operator', value });
    } else {
      let value = '';
      while (i < input.length && !/[\s()"]/.test(input[i]) && !OPERATOR_CHARS.includes(input[i])) {
        value += input[i];
        i++;
      }
      tokens.push({ type: 'word', value });
    }
  }

  return tokens;
}

// --- פרסר ---

type RawExpression =
  | { kind: 'all' }
  | { kind: 'relation'; property: string; operator: string; value: string }
  | { kind: 'logical'; operator: 'and' | 'or'; left: RawExpression; right: RawExpression };

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): RawExpression {
    const expression = this.parseOr();
    if (this.position < this.tokens.length) {
      throw new CriteriaSyntaxError('unexpected trailing tokens');
    }
    return expression;
  }

  private peekKeyword(keyword: string): boolean {
    const token = this.tokens[this.position];
    return token?.type === 'word' && token.value.toLowerCase() === keyword;
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (!token) {
      throw new CriteriaSyntaxError('unexpected end of criteria');
    }
    this.position++;
    return token;
  }

  private parseOr(): RawExpression {
    let left = this.parseAnd();
    while (this.peekKeyword('or')) {
      this.position++;
      left = { kind: 'logical', operator: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): RawExpression {
    let left = this.parseRelation();
    while (this.peekKeyword('and')) {
      this.position++;
      left = { kind: 'logical', operator: 'and', left, right: this.parseRelation() };
    }
    return left;
  }

  private parseRelation(): RawExpression {
    const token = this.next();

    if (token.type === 'lparen') {
      const inner = this.parseOr();
      if (this.next().type !== 'rparen') {
        throw new CriteriaSyntaxError('expected ")"');
      }
      return inner;
    }

    if (token.type !== 'word') {
      throw new CriteriaSyntaxError('expected a property name');
    }
    if (token.value === '*') {
      return { kind: 'all' };
    }

    const operatorToken = this.next();
    let operator: string;
    if (operatorToken.type === 'operator') {
      if (!COMPARISON_OPERATORS.includes(operatorToken.value)) {
        throw new CriteriaSyntaxError(`unknown operator '${operatorToken.value}'`);
      }
      operator = operatorToken.value;
    } else if (operatorToken.type === 'word') {
      operator = operatorToken.value.toLowerCase();
    } else {
      throw new CriteriaSyntaxError(`expected an operator after '${token.value}'`);
    }

    const valueToken = this.next();
    if (operator === 'exists') {
      if (valueToken.type !== 'word' || !['true', 'false'].includes(valueToken.value.toLowerCase())) {
        throw new CriteriaSyntaxError('exists expects true or false');
      }
      return { kind: 'relation', property: token.value, operator, value: valueToken.value.toLowerCase() };
    }
    if (valueToken.type !== 'string') {
      throw new CriteriaSyntaxError(`operator '${operator}' expects a quoted value`);
    }
    return { kind: 'relation', property: token.value, operator, value: valueToken.value };
  }
}

// --- מיפוי לעמודות ---

const AUDIO_ONLY_PROPERTIES: readonly SearchProperty[] = ['dc:creator', 'upnp:artist', 'upnp:album', 'upnp:genre'];
const SEARCH_PROPERTIES: readonly SearchProperty[] = ['dc:title', '@id', 'pv:lastUpdated', ...AUDIO_ONLY_PROPERTIES];

const isSearchProperty = (name: string): name is SearchProperty =>
  (SEARCH_PROPERTIES as readonly string[]).includes(name);

const SEARCH_OPERATORS: Record<string, SearchOperator> = {
  contains: 'contains',
  doesnotcontain: 'doesNotContain',
  '=': '=',
  '!=': '!=',
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
};

function columnOf(property: SearchProperty, family: SearchFamily): string {
  switch (property) {
    case 'dc:title':
      return `${family.table}.titlesearch`;
    case 'pv:lastUpdated':
      return `${family.table}.updated_time`;
    case '@id':
      return `${family.table}.${family.idColumn}`;
    case 'dc:creator':
    case 'upnp:artist':
      return 'contributors.namesearch';
    case 'upnp:album':
      return 'albums.titlesearch';
    case 'upnp:genre':
      return 'genres.namesearch';
  }
}

const TAG_OF_PROPERTY: Partial<Record<SearchProperty, string>> = {
  'pv:lastUpdated': 'U',
  'dc:creator': 'a',
  'upnp:artist': 'a',
  'upnp:album': 'l',
  'upnp:genre': 'g',
};

const TAG_ORDER = ['U', 'a', 'l', 'g'];

function familyOfClass(upnpClass: string): SearchFamily {
  const lower = upnpClass.toLowerCase();
  if (lower.includes('object.item.videoitem')) return VIDEO_FAMILY;
  if (lower.includes('object.item.imageitem')) return IMAGE_FAMILY;
  return TRACK_FAMILY;
}

function collectClasses(expression: RawExpression, into: string[]): string[] {
  if (expression.kind === 'relation' && expression.property === 'upnp:class' && expression.operator === 'derivedfrom') {
    into.push(expression.value);
  } else if (expression.kind === 'logical') {
    collectClasses(expression.left, into);
    collectClasses(expression.right, into);
  }
  return into;
}

function toPredicate(expression: RawExpression, family: SearchFamily, used: Set<SearchProperty>): SearchPredicate {
  if (expression.kind === 'all') {
    return expression;
  }
  if (expression.kind === 'logical') {
    return {
      kind: 'logical',
      operator: expression.operator,
      left: toPredicate(expression.left, family, used),
      right: toPredicate(expression.right, family, used),
    };
  }

  const { property, operator, value } = expression;

  // בחירת משפחת הטבלה כבר נעשתה; כאן זו טאוטולוגיה
  if (property === 'upnp:class' && operator === 'derivedfrom') {
    return { kind: 'all' };
  }
  if (property === '@refID' && operator === 'exists') {
    return { kind: 'all' };
  }
  if (!isSearchProperty(property)) {
    throw new CriteriaSyntaxError(`property '${property}' is not searchable`);
  }
  if (family.table !== 'tracks' && AUDIO_ONLY_PROPERTIES.includes(property)) {
    throw new CriteriaSyntaxError(`property '${property}' applies to audio tracks only`);
  }

  used.add(property);

  if (operator === 'exists') {
    return { kind: 'exists', property, exists: value === 'true' };
  }
  const searchOperator = SEARCH_OPERATORS[operator.toLowerCase()];
  if (!searchOperator) {
    throw new CriteriaSyntaxError(`operator '${operator}' is not supported`);
  }
  return { kind: 'compare', property, operator: searchOperator, value };
}

const quoteSql = (value: string): string => `"${value.replace(/"/g, '""')}"`;

/**
 * @hebrew ממיר עץ פרדיקט למחרוזת SQL. contains הופך ל-LIKE על ערך באותיות גדולות,
 * כי עמודות ה-*search מאוחסנות באותיות גדולות.
 */
export function predicateToSql(predicate: SearchPredicate, family: SearchFamily): string {
  switch (predicate.kind) {
    case 'all':
      return '1=1';
    case 'exists':
      return `${columnOf(predicate.property, family)} ${predicate.exists ? 'IS NOT NULL' : 'IS NULL'}`;
    case 'compare': {
      const column = columnOf(predicate.property, family);
      switch (predicate.operator) {
        case 'contains':
          return `${column} LIKE ${quoteSql(`%${predicate.value.toUpperCase()}%`)}`;
        case 'doesNotContain':
          return `${column} NOT LIKE ${quoteSql(`%${predicate.value.toUpperCase()}%`)}`;
        default:
          return `${column} ${predicate.operator} ${quoteSql(predicate.value)}`;
      }
    }
    case 'logical': {
      const wrap = (child: SearchPredicate): string =>
        child.kind === 'logical' ? `(${predicateToSql(child, family)})` : predicateToSql(child, family);
      return `${wrap(predicate.left)} ${predicate.operator.toUpperCase()} ${wrap(predicate.right)}`;
    }
  }
}

/**
 * @hebrew מפענח SearchCriteria.
 * @param criteria - מחרוזת החיפוש כפי שהתקבלה מהלקוח ("*" = הכל).
 * @returns SearchDecoding, או Unsupported אם הביטוי לא תקין או לא ניתן למיפוי.
 */
export function decodeSearchCriteria(criteria: string): SearchDecoding | Unsupported {
  const text = criteria.replace(/&quot;/g, '"').replace(/&apos;/g, "'").trim();

  if (text === '' || text === '*') {
    return { kind: 'search', family: TRACK_FAMILY, sql: '1=1', predicate: { kind: 'all' }, tags: '' };
  }

  try {
    const expression = new Parser(tokenize(text)).parse();

    const families = new Set(collectClasses(expression, []).map(familyOfClass));
    if (families.size > 1) {
      return { kind: 'unsupported', reason: 'criteria mixes audio, video and image classes' };
    }
    const [family = TRACK_FAMILY] = families;

    const used = new Set<SearchProperty>();
    const predicate = toPredicate(expression, family, used);
    const tagLetters = new Set([...used].map(property => TAG_OF_PROPERTY[property]));
    const tags = TAG_ORDER.filter(tag => tagLetters.has(tag)).join('');

    return { kind: 'search', family, sql: predicateToSql(predicate, family), predicate, tags };
  } catch (error) {
    if (error instanceof CriteriaSyntaxError) {
      return { kind: 'unsupported', reason: error.message };
    }
    throw error;
  }
}

// --- מיון ---

const isSortProperty = (name: string): name is SortProperty =>
  [
    'dc:title', 'dc:creator', 'upnp:artist', 'upnp:album', 'upnp:genre',
    'upnp:originalTrackNumber', 'dc:date', 'pv:modificationTime', 'pv:addedTime', 'pv:lastUpdated',
  ].includes(name);

function sortColumnOf(property: SortProperty, table: SearchTable): { column: string; tag: string } {
  switch (property) {
    case 'dc:title':
      return { column: `${table}.titlesort`, tag: '' };
    case 'dc:creator':
    case 'upnp:artist':
      return { column: 'contributors.namesort', tag: 'a' };
    case 'upnp:album':
      return { column: 'albums.titlesort', tag: 'l' };
    case 'upnp:genre':
      return { column: 'genres.namesort', tag: 'g' };
    case 'upnp:originalTrackNumber':
      return { column: 'tracks.tracknum', tag: '' };
    case 'dc:date':
    case 'pv:modificationTime':
      return { column: table === 'tracks' ? `${table}.timestamp` : `${table}.mtime`, tag: '' };
    case 'pv:addedTime':
      return { column: `${table}.added_time`, tag: '' };
    case 'pv:lastUpdated':
      return { column: `${table}.updated_time`, tag: '' };
  }
}

/**
 * @hebrew מפענח SortCriteria ("+dc:title,-dc:date"). מאפיינים לא מוכרים ופריטים בלי סימן מושמטים עם אזהרה בלוג.
 */
export function decodeSortCriteria(criteria: string, table: SearchTable): SortDecoding {
  const clauses: string[] = [];
  const keys: SortKey[] = [];
  let tags = '';

  for (const part of criteria.split(',')) {
    const clause = part.trim();
    if (!clause) continue;

    const match = /^([+-])(.+)$/.exec(clause);
    if (!match) {
      logger.warn(`Ignoring sort clause without a direction: '${clause}'`);
      continue;
    }

    const [, sign, property] = match;
    if (!isSortProperty(property)) {
      logger.warn(`Ignoring unsupported sort property '${property}'`);
      continue;
    }

    const direction = sign === '+' ? 'ASC' : 'DESC';
    const { column, tag } = sortColumnOf(property, table);
    clauses.push(`${column} ${direction}`);
    keys.push({ property, direction });
    tags += tag;
  }

  return { orderSql: clauses.join(', '), tags, keys };
}
