import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger.js';
import { LedgerParseError, LedgerWriteError, describeError } from '../utils/errors.js';

export const LEDGER_BASENAME = 'flickr-uploaded-files.json';

/**
 * What to do with a ledger file that exists but is not a JSON object of
 * string values: `reset` starts from an empty mapping, `fail` refuses.
 */
export type LedgerParsePolicy = 'reset' | 'fail';

export interface LedgerLocation {
  storeInImageDir: boolean;
  configDir: string;
}

/**
 * Record of files already uploaded, keyed by base filename.
 *
 * Backed by one JSON file. Entries are never overwritten: the first photo id
 * recorded for a filename is the one that stays.
 */
export class Ledger {
  private readonly filePath: string;
  private readonly photoIds: Map<string, string>;

  private constructor(filePath: string, photoIds: Map<string, string>) {
    this.filePath = filePath;
    this.photoIds = photoIds;
  }

  /**
   * Ledger file for an image: a hidden file beside the image, or the shared
   * file in the config directory.
   */
  static pathFor(imagePath: string, location: LedgerLocation): string {
    if (location.storeInImageDir) {
      return path.join(path.dirname(imagePath), `.${LEDGER_BASENAME}`);
    }
    return path.join(location.configDir, LEDGER_BASENAME);
  }

  static open(filePath: string, policy: LedgerParsePolicy = 'reset'): Ledger {
    if (!fs.existsSync(filePath)) {
      return new Ledger(filePath, new Map());
    }

    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      return new Ledger(filePath, parseLedger(filePath, content));
    } catch (error) {
      if (policy === 'fail') {
        if (error instanceof LedgerParseError) throw error;
        throw LedgerParseError.fromContent(filePath, describeError(error));
      }
      logger.error(`Ignoring unreadable upload ledger ${filePath}: ${describeError(error)}`);
      return new Ledger(filePath, new Map());
    }
  }

  get path(): string {
    return this.filePath;
  }

  get size(): number {
    return this.photoIds.size;
  }

  /**
   * Photo id recorded for a file. Only the base name of `filename` is used.
   */
  lookup(filename: string): string | undefined {
    return this.photoIds.get(path.basename(filename));
  }

  /**
   * Record an upload and persist the ledger.
   * Returns false without writing when the filename is already recorded.
   */
  recordIfAbsent(filename: string, photoId: string): boolean {
    const key = path.basename(filename);
    if (this.photoIds.has(key)) {
      return false;
    }
    this.photoIds.set(key, photoId);
    try {
      this.flush();
    } catch (error) {
      // only what is on disk counts as recorded
      this.photoIds.delete(key);
      throw error;
    }
    return true;
  }

  /**
   * Write the whole mapping to a temp file, then rename it over the ledger
   */
  flush(): void {
    const tempPath = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(this.entries(), null, 2), { encoding: 'utf-8', mode: 0o664 });
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      throw LedgerWriteError.fromWrite(this.filePath, error);
    }
  }

  entries(): Record<string, string> {
    return Object.fromEntries(this.photoIds);
  }
}

function parseLedger(filePath: string, content: string): Map<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw LedgerParseError.fromContent(filePath, describeError(error));
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw LedgerParseError.fromContent(filePath, 'top level is not an object');
  }

  const photoIds = new Map<string, string>();
  for (const [filename, photoId] of Object.entries(parsed)) {
    if (typeof photoId !== 'string') {
      throw LedgerParseError.fromContent(filePath, `value for "${filename}" is not a string`);
    }
    photoIds.set(filename, photoId);
  }
  return photoIds;
}
