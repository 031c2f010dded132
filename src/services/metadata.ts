import { ExifDateTime, ExifTool, type WriteTags } from 'exiftool-vendored';
import fs from 'fs';
import path from 'path';
import type { ImageInfo } from '../models/rules.js';
import { logger } from '../utils/logger.js';
import { LocalMutationError, MetadataError, describeError } from '../utils/errors.js';
import { unique } from '../utils/keywords.js';

/**
 * Reads and edits the metadata embedded in image files
 */
export interface MetadataTool {
  extractMetadata(filePath: string): Promise<ImageInfo>;
  /** Remove the given keyword values from the file in place */
  stripKeywords(filePath: string, keywords: string[]): Promise<void>;
  close(): Promise<void>;
}

type TagFields = Map<string, unknown>;

function firstString(fields: TagFields, names: string[]): string {
  for (const name of names) {
    const value = fields.get(name);
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
    if (typeof value === 'number') {
      return String(value);
    }
  }
  return '';
}

export function toStringList(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  const items = Array.isArray(value) ? value : [value];
  return items
    .filter((item) => typeof item === 'string' || typeof item === 'number')
    .map((item) => String(item).trim())
    .filter((item) => item !== '');
}

export function toDate(value: unknown): Date | undefined {
  if (value instanceof ExifDateTime) {
    return value.toDate();
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }
  return undefined;
}

/**
 * Map exiftool tags onto ImageInfo.
 * Keywords are the IPTC Keywords followed by XMP Subject, without repeats.
 */
export function imageInfoFromTags(tags: object): ImageInfo {
  const fields: TagFields = new Map(Object.entries(tags));
  const info: ImageInfo = {
    title: firstString(fields, ['Title', 'ObjectName', 'XPTitle']),
    description: firstString(fields, ['Description', 'ImageDescription', 'Caption-Abstract']),
    keywords: unique([...toStringList(fields.get('Keywords')), ...toStringList(fields.get('Subject'))]),
  };

  const date = toDate(fields.get('DateTimeOriginal')) ?? toDate(fields.get('CreateDate'));
  if (date) {
    info.date = date;
  }
  return info;
}

/**
 * Tag values as stored: strings untouched, numbers in exiftool's rendering
 */
function rawStringList(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  const items = Array.isArray(value) ? value : [value];
  return items
    .filter((item) => typeof item === 'string' || typeof item === 'number')
    .map((item) => String(item));
}

/**
 * Values of a keyword field left after removing `keywords`, or undefined
 * when nothing in the field matches.
 */
function keptValues(value: unknown, keywords: Set<string>): string[] | undefined {
  const existing = rawStringList(value);
  const kept = existing.filter((item) => !keywords.has(item.trim()));
  return kept.length === existing.length ? undefined : kept;
}

/**
 * Keyword tags to write back after removing `keywords`.
 * Kept values are written as read. Fields the file does not have, or that
 * lose nothing, are left alone.
 */
export function keywordUpdates(tags: object, keywords: string[]): WriteTags {
  const fields: TagFields = new Map(Object.entries(tags));
  const removed = new Set(keywords);
  const updates: WriteTags = {};

  const keptKeywords = keptValues(fields.get('Keywords'), removed);
  if (keptKeywords) {
    updates.Keywords = keptKeywords;
  }

  const keptSubject = keptValues(fields.get('Subject'), removed);
  if (keptSubject) {
    updates.Subject = keptSubject;
  }

  return updates;
}

/**
 * MetadataTool backed by exiftool-vendored. Uses the bundled exiftool unless
 * an explicit binary is configured.
 */
export class ExifToolMetadataService implements MetadataTool {
  private exiftool: ExifTool;

  constructor(exiftoolPath?: string) {
    this.exiftool = exiftoolPath ? new ExifTool({ exiftoolPath }) : new ExifTool();
  }

  async extractMetadata(filePath: string): Promise<ImageInfo> {
    try {
      const tags = await this.exiftool.read(filePath);
      const info = imageInfoFromTags(tags);
      logger.debug(`${path.basename(filePath)}: ${info.keywords.length} keywords, title "${info.title}"`);
      return info;
    } catch (error) {
      throw MetadataError.fromRead(filePath, error);
    }
  }

  async stripKeywords(filePath: string, keywords: string[]): Promise<void> {
    if (keywords.length === 0) return;

    try {
      const tags = await this.exiftool.read(filePath);
      const updates = keywordUpdates(tags, keywords);
      if (Object.keys(updates).length === 0) {
        logger.debug(`No keywords to remove from ${path.basename(filePath)}`);
        return;
      }
      await this.exiftool.write(filePath, updates);
    } catch (error) {
      throw LocalMutationError.fromStrip(filePath, error);
    }

    // exiftool keeps the untouched file as <name>_original; the edit replaces it
    const backupPath = `${filePath}_original`;
    try {
      if (fs.existsSync(backupPath)) {
        fs.unlinkSync(backupPath);
      }
    } catch (cleanupError) {
      logger.warn(`Could not clean up backup file ${backupPath}: ${describeError(cleanupError)}`);
    }
  }

  async close(): Promise<void> {
    try {
      await this.exiftool.end();
    } catch (error) {
      logger.warn(`Error closing exiftool: ${describeError(error)}`);
    }
  }
}
