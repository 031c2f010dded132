/**
 * Error taxonomy for the uploader.
 *
 * Only ConfigError stops the process; every other kind is reported for the
 * file being processed and the batch moves on to the next file.
 */

export type ErrorKind =
  | 'config'
  | 'metadata'
  | 'local_mutation'
  | 'upload'
  | 'post_upload'
  | 'ledger_parse'
  | 'ledger_write';

export abstract class UploaderError extends Error {
  abstract readonly kind: ErrorKind;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }

  get exitCode(): number {
    return 1;
  }
}

/**
 * Missing credentials, unusable tool path or a malformed rules file (exit code 2)
 */
export class ConfigError extends UploaderError {
  readonly kind = 'config';

  override get exitCode(): number {
    return 2;
  }

  static fromMissing(variables: string[]): ConfigError {
    return new ConfigError(
      `Missing configuration: ${variables.join(', ')}`,
      'Set these in the environment or in a .env file (see .env.example)'
    );
  }

  static fromRulesFile(rulesPath: string, reason: string): ConfigError {
    return new ConfigError(`Invalid rules file ${rulesPath}: ${reason}`);
  }
}

export class MetadataError extends UploaderError {
  readonly kind = 'metadata';

  static fromRead(filePath: string, cause: unknown): MetadataError {
    return new MetadataError(`Cannot read metadata from ${filePath}: ${describeError(cause)}`);
  }
}

export class LocalMutationError extends UploaderError {
  readonly kind = 'local_mutation';

  static fromStrip(filePath: string, cause: unknown): LocalMutationError {
    return new LocalMutationError(`Cannot remove keywords from ${filePath}: ${describeError(cause)}`);
  }
}

export class UploadError extends UploaderError {
  readonly kind: ErrorKind = 'upload';
}

/**
 * Flickr answered with stat="fail"
 */
export class FlickrApiError extends UploadError {
  readonly code: number;

  constructor(code: number, message: string) {
    super(`Flickr error ${code}: ${message}`);
    this.code = code;
  }
}

export class PostUploadError extends UploaderError {
  readonly kind = 'post_upload';
}

export class LedgerParseError extends UploaderError {
  readonly kind = 'ledger_parse';

  static fromContent(ledgerPath: string, reason: string): LedgerParseError {
    return new LedgerParseError(
      `Upload ledger ${ledgerPath} is not a JSON object of filename to photo id: ${reason}`,
      'Fix or remove the file, or set LEDGER_ON_CORRUPT=reset to start with an empty ledger'
    );
  }
}

export class LedgerWriteError extends UploaderError {
  readonly kind = 'ledger_write';

  static fromWrite(ledgerPath: string, cause: unknown): LedgerWriteError {
    return new LedgerWriteError(`Unable to write ${ledgerPath}: ${describeError(cause)}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function getExitCode(error: unknown): number {
  if (error instanceof UploaderError) {
    return error.exitCode;
  }
  return 1;
}
