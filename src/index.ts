#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, validateConfig, type Config } from './config.js';
import { logger } from './utils/logger.js';
import { UploaderError, describeError, getExitCode } from './utils/errors.js';
import { ExifToolMetadataService } from './services/metadata.js';
import { FlickrService, editUrl, photoUrl } from './services/flickr.js';
import { UploadService, type BatchSummary, type UploadSettings } from './services/upload-service.js';
import { describeActions } from './services/rule-matcher.js';

const program = new Command();

program
  .name('flickr-upload')
  .description('Upload photos to Flickr, applying keyword and album rules from embedded metadata')
  .version('1.0.0');

function loadValidConfig(): Config {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  validateConfig(config);
  return config;
}

function uploadSettings(config: Config): UploadSettings {
  return {
    rules: config.rules,
    configDir: config.configDir,
    storeLedgerInImageDir: config.storeLedgerInImageDir,
    setDatePosted: config.setDatePosted,
    ledgerParsePolicy: config.ledgerParsePolicy,
    username: config.flickr.username,
  };
}

/**
 * Report an error that ends the command. Configuration errors exit with 2.
 */
function reportFatal(error: unknown): void {
  logger.error(describeError(error));
  if (error instanceof UploaderError && error.details) {
    logger.info(error.details);
  }
  process.exitCode = getExitCode(error);
}

function printSummary(summary: BatchSummary, username: string): void {
  const { counts } = summary;
  console.log('All done');
  console.log(
    `  Uploaded: ${counts.uploaded}, already uploaded: ${counts.already_uploaded}, ` +
    `dry run: ${counts.dry_run}, failed: ${counts.metadata_error + counts.upload_error + counts.ledger_error}`
  );

  const warnings = summary.results.reduce((total, result) => total + result.warnings.length, 0);
  if (warnings > 0) {
    console.log(`  Warnings: ${warnings} (see messages above)`);
  }

  if (username) {
    console.log(`View: ${photoUrl(username)}`);
  }
  if (summary.photoIds.length > 0) {
    console.log(`Edit: ${editUrl(summary.photoIds)}`);
  }
}

program
  .command('upload')
  .description('Upload images to Flickr')
  .argument('<files...>', 'Image files to upload')
  .option('-f, --force', 'Force upload of file even if already uploaded')
  .option('-n, --dry-run', 'Show what would have been uploaded')
  .action(async (files: string[], options: { force?: boolean; dryRun?: boolean }) => {
    let metadata: ExifToolMetadataService | null = null;

    try {
      const config = loadValidConfig();
      metadata = new ExifToolMetadataService(config.exiftoolPath);
      const service = new UploadService(uploadSettings(config), metadata, new FlickrService(config.flickr));

      const summary = await service.uploadFiles(files, {
        force: options.force === true,
        dryRun: options.dryRun === true || config.dryRun,
      });
      printSummary(summary, config.flickr.username);
    } catch (error) {
      reportFatal(error);
    } finally {
      await metadata?.close();
    }
  });

program
  .command('info')
  .description('Show metadata, rule actions and upload status of images')
  .argument('<files...>', 'Image files to inspect')
  .action(async (files: string[]) => {
    let metadata: ExifToolMetadataService | null = null;

    try {
      const config = loadConfig();
      logger.setLevel(config.logLevel);
      metadata = new ExifToolMetadataService(config.exiftoolPath);
      const service = new UploadService(uploadSettings(config), metadata, new FlickrService(config.flickr));

      for (const file of files) {
        try {
          const { info, actions, uploadedPhotoId } = await service.inspectFile(file);
          console.log(file);
          console.log(`  Title: ${info.title || '(none)'}`);
          console.log(`  Description: ${info.description || '(none)'}`);
          console.log(`  Keywords: ${info.keywords.join(', ') || '(none)'}`);
          console.log(`  Taken: ${info.date ? info.date.toISOString() : '(unknown)'}`);
          console.log(`  Tags to upload: ${actions.keywordsToAdd.join(', ') || '(none)'}`);
          for (const line of describeActions(actions)) {
            console.log(`  ${line}`);
          }
          console.log(
            uploadedPhotoId
              ? `  Uploaded: ${photoUrl(config.flickr.username, uploadedPhotoId)}`
              : '  Uploaded: no'
          );
          console.log('');
        } catch (error) {
          logger.error(describeError(error));
        }
      }
    } catch (error) {
      reportFatal(error);
    } finally {
      await metadata?.close();
    }
  });

program
  .command('check')
  .description('Verify the configured Flickr credentials')
  .action(async () => {
    try {
      const config = loadValidConfig();
      const user = await new FlickrService(config.flickr).testLogin();
      console.log(`Logged in to Flickr as ${user.username} (${user.id})`);
      console.log(`Rules loaded: ${config.rules.length} from ${config.rulesPath}`);
    } catch (error) {
      reportFatal(error);
    }
  });

await program.parseAsync();
