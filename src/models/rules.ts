import { unique } from '../utils/keywords.js';

export interface ImageInfo {
  title: string;
  description: string;
  keywords: string[];
  /** Capture time (DateTimeOriginal), when the file has one */
  date?: Date;
}

/**
 * A Flickr album (photoset)
 */
export interface Album {
  id: string;
  name: string;
}

/**
 * Keyword conditions. An empty or missing list places no constraint.
 */
export interface RuleCondition {
  excludesAll?: string[];
  excludesAny?: string[];
  includesAll?: string[];
  includesAny?: string[];
}

export interface RuleAction {
  /** Strip the matched keywords from the file and from the uploaded tags */
  delete: boolean;
  albums: Album[];
}

export interface Rule {
  condition: RuleCondition;
  action: RuleAction;
}

export function formatAlbum(album: Album): string {
  return `${album.name} (${album.id})`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseKeywordList(value: unknown, field: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new Error(`${field} must be a list of keywords`);
  }
  const keywords: string[] = [];
  for (const item of value) {
    if (typeof item === 'string') {
      keywords.push(item);
    } else if (typeof item === 'number') {
      keywords.push(String(item));
    } else {
      throw new Error(`${field} contains a non-string keyword`);
    }
  }
  return unique(keywords);
}

function parseAlbum(value: unknown, field: string): Album {
  if (!isRecord(value)) {
    throw new Error(`${field} must be an object with id and name`);
  }
  const id = typeof value.id === 'number' ? String(value.id) : value.id;
  if (typeof id !== 'string' || id === '') {
    throw new Error(`${field}.id is required`);
  }
  const name = typeof value.name === 'string' && value.name !== '' ? value.name : id;
  return { id, name };
}

/**
 * Validate one entry of the rules file.
 * Throws with a message naming the offending field.
 */
export function parseRule(value: unknown, index: number): Rule {
  const prefix = `rules[${index}]`;
  if (!isRecord(value)) {
    throw new Error(`${prefix} must be an object`);
  }

  const rawCondition = value.condition ?? {};
  if (!isRecord(rawCondition)) {
    throw new Error(`${prefix}.condition must be an object`);
  }
  const condition: RuleCondition = {};
  const fields = ['excludesAll', 'excludesAny', 'includesAll', 'includesAny'] as const;
  for (const field of fields) {
    const list = parseKeywordList(rawCondition[field], `${prefix}.condition.${field}`);
    if (list) {
      condition[field] = list;
    }
  }

  const rawAction = value.action ?? {};
  if (!isRecord(rawAction)) {
    throw new Error(`${prefix}.action must be an object`);
  }
  if (rawAction.delete !== undefined && typeof rawAction.delete !== 'boolean') {
    throw new Error(`${prefix}.action.delete must be true or false`);
  }
  const rawAlbums = rawAction.albums ?? [];
  if (!Array.isArray(rawAlbums)) {
    throw new Error(`${prefix}.action.albums must be a list`);
  }

  return {
    condition,
    action: {
      delete: rawAction.delete === true,
      albums: rawAlbums.map((album, i) => parseAlbum(album, `${prefix}.action.albums[${i}]`)),
    },
  };
}

/**
 * Parse the contents of a rules file: either `{ "rules": [...] }` or a bare list
 */
export function parseRules(value: unknown): Rule[] {
  const list = isRecord(value) ? value.rules ?? [] : value;
  if (!Array.isArray(list)) {
    throw new Error('expected a "rules" list');
  }
  return list.map((rule, index) => parseRule(rule, index));
}
