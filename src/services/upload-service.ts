import path from 'path';
import type { Config } from '../config.js';
import { formatAlbum, type ImageInfo } from '../models/rules.js';
import { Ledger } from '../models/ledger.js';
import { logger } from '../utils/logger.js';
import {
  LedgerWriteError,
  LocalMutationError,
  PostUploadError,
  UploaderError,
  describeError,
} from '../utils/errors.js';
import type { MetadataTool } from './metadata.js';
import { photoUrl, type PhotoService } from './flickr.js';
import { describeActions, evaluateRules, type RuleActions } from './rule-matcher.js';

export type UploadSettings = Pick<
  Config,
  'rules' | 'configDir' | 'storeLedgerInImageDir' | 'setDatePosted' | 'ledgerParsePolicy'
> & {
  /** Flickr account name, for the photo links printed after each file */
  username: string;
};

export interface UploadOptions {
  /** Upload even when the ledger already has the file */
  force?: boolean;
  /** Evaluate rules and report, without touching the file, Flickr or the ledger */
  dryRun?: boolean;
}

export type UploadStatus =
  | 'uploaded'
  | 'already_uploaded'
  | 'dry_run'
  | 'metadata_error'
  | 'upload_error'
  | 'ledger_error';

export interface UploadResult {
  filePath: string;
  status: UploadStatus;
  /** Flickr photo id; empty unless this run uploaded the file */
  photoId: string;
  title?: string;
  actions?: RuleActions;
  /** Non-fatal problems: keyword stripping, ledger write, date or album updates */
  warnings: UploaderError[];
}

export interface BatchSummary {
  results: UploadResult[];
  photoIds: string[];
  counts: Record<UploadStatus, number>;
}

export interface FileInspection {
  info: ImageInfo;
  actions: RuleActions;
  uploadedPhotoId?: string;
}

export function titleFor(filePath: string, info: ImageInfo): string {
  const title = info.title.trim();
  if (title !== '') return title;
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Per-file upload pipeline: ledger check, metadata, rules, keyword stripping,
 * upload, ledger record, then date and album updates on Flickr.
 */
export class UploadService {
  private settings: UploadSettings;
  private metadata: MetadataTool;
  private photos: PhotoService;

  constructor(settings: UploadSettings, metadata: MetadataTool, photos: PhotoService) {
    this.settings = settings;
    this.metadata = metadata;
    this.photos = photos;
  }

  private openLedger(filePath: string): Ledger {
    const ledgerPath = Ledger.pathFor(filePath, {
      storeInImageDir: this.settings.storeLedgerInImageDir,
      configDir: this.settings.configDir,
    });
    return Ledger.open(ledgerPath, this.settings.ledgerParsePolicy);
  }

  async uploadFile(filePath: string, options: UploadOptions = {}): Promise<UploadResult> {
    const result: UploadResult = { filePath, status: 'uploaded', photoId: '', warnings: [] };
    logger.info(`Processing ${filePath}`);

    let ledger: Ledger;
    try {
      ledger = this.openLedger(filePath);
    } catch (error) {
      logger.error(describeError(error));
      result.status = 'ledger_error';
      return result;
    }

    const uploadedPhotoId = ledger.lookup(filePath);
    if (uploadedPhotoId !== undefined) {
      if (!options.force) {
        logger.info('This image has already been uploaded to Flickr.');
        logger.info(`View this photo: ${photoUrl(this.settings.username, uploadedPhotoId)}\n`);
        result.status = 'already_uploaded';
        return result;
      }
      logger.info('This image has already been uploaded to Flickr. Forcing upload.');
    }

    let info: ImageInfo;
    try {
      info = await this.metadata.extractMetadata(filePath);
    } catch (error) {
      logger.error(describeError(error));
      result.status = 'metadata_error';
      return result;
    }

    const actions = evaluateRules(info.keywords, this.settings.rules);
    result.actions = actions;
    const actionLines = describeActions(actions);
    if (actionLines.length > 0) {
      logger.info(`${actionLines.join('\n')}\n`);
    }

    if (options.dryRun) {
      logger.info('Would upload photo to Flickr\n');
      result.status = 'dry_run';
      return result;
    }

    if (actions.keywordsToRemove.length > 0) {
      try {
        await this.metadata.stripKeywords(filePath, actions.keywordsToRemove);
      } catch (error) {
        this.warn(result, error instanceof UploaderError ? error : LocalMutationError.fromStrip(filePath, error));
      }
    }

    const title = titleFor(filePath, info);
    result.title = title;

    logger.info('Uploading photo to Flickr');
    let photoId: string;
    try {
      photoId = await this.photos.upload(filePath, {
        title,
        description: info.description || undefined,
        tags: actions.keywordsToAdd,
      });
    } catch (error) {
      logger.error(describeError(error));
      result.status = 'upload_error';
      return result;
    }
    result.photoId = photoId;

    // Recording can fail after a successful upload; the photo then exists on
    // Flickr without a ledger entry and a later run would upload it again.
    try {
      if (!ledger.recordIfAbsent(filePath, photoId)) {
        logger.debug(`Ledger already lists ${path.basename(filePath)}; keeping the first photo id`);
      }
    } catch (error) {
      this.warn(result, error instanceof LedgerWriteError ? error : LedgerWriteError.fromWrite(ledger.path, error));
    }
    logger.info(`Uploaded photo '${title}'`);

    await this.applyPostUploadUpdates(result, photoId, info, actions);

    logger.info(`View this photo: ${photoUrl(this.settings.username, photoId)}\n`);
    return result;
  }

  /**
   * Date posted and album membership. Each update is attempted on its own;
   * a failure is recorded as a warning and the rest still run.
   */
  private async applyPostUploadUpdates(
    result: UploadResult,
    photoId: string,
    info: ImageInfo,
    actions: RuleActions
  ): Promise<void> {
    if (this.settings.setDatePosted && info.date) {
      try {
        await this.photos.setDatePosted(photoId, info.date);
      } catch (error) {
        this.warn(
          result,
          new PostUploadError(`Failed to update photo ${photoId}'s date posted: ${describeError(error)}`)
        );
      }
    }

    for (const album of actions.albumsToAddTo) {
      try {
        await this.photos.addToAlbum(album.id, photoId);
        logger.info(`Added photo ${photoId} to set ${formatAlbum(album)}`);
      } catch (error) {
        this.warn(
          result,
          new PostUploadError(`Failed adding photo to the set ${formatAlbum(album)}: ${describeError(error)}`)
        );
      }
    }
  }

  private warn(result: UploadResult, error: UploaderError): void {
    result.warnings.push(error);
    logger.error(error.message);
  }

  /**
   * Upload files one at a time, in order
   */
  async uploadFiles(filePaths: string[], options: UploadOptions = {}): Promise<BatchSummary> {
    const summary: BatchSummary = {
      results: [],
      photoIds: [],
      counts: {
        uploaded: 0,
        already_uploaded: 0,
        dry_run: 0,
        metadata_error: 0,
        upload_error: 0,
        ledger_error: 0,
      },
    };

    for (const filePath of filePaths) {
      const result = await this.uploadFile(filePath, options);
      summary.results.push(result);
      summary.counts[result.status]++;
      if (result.photoId !== '') {
        summary.photoIds.push(result.photoId);
      }
    }

    return summary;
  }

  /**
   * Metadata, rule actions and ledger status for a file, with no side effects
   */
  async inspectFile(filePath: string): Promise<FileInspection> {
    const info = await this.metadata.extractMetadata(filePath);
    const inspection: FileInspection = {
      info,
      actions: evaluateRules(info.keywords, this.settings.rules),
    };
    const uploadedPhotoId = this.openLedger(filePath).lookup(filePath);
    if (uploadedPhotoId !== undefined) {
      inspection.uploadedPhotoId = uploadedPhotoId;
    }
    return inspection;
  }
}
