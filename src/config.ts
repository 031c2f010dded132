import dotenv from 'dotenv';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseRules, type Rule } from './models/rules.js';
import type { LedgerParsePolicy } from './models/ledger.js';
import { ConfigError, describeError } from './utils/errors.js';

dotenv.config();

export interface FlickrConfig {
  apiKey: string;
  apiSecret: string;
  oauthToken: string;
  oauthTokenSecret: string;
  username: string;
}

export interface Config {
  flickr: FlickrConfig;
  /** Explicit exiftool binary; the bundled one is used when unset */
  exiftoolPath?: string;
  configDir: string;
  rulesPath: string;
  rules: Rule[];
  storeLedgerInImageDir: boolean;
  setDatePosted: boolean;
  ledgerParsePolicy: LedgerParsePolicy;
  dryRun: boolean;
  logLevel: string;
}

export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'flickr-uploader');

function expandHome(value: string): string {
  if (value === '~' || value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(1));
  }
  return value;
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Read the rules file. A missing file means no rules.
 */
export function loadRules(rulesPath: string): Rule[] {
  if (!fs.existsSync(rulesPath)) {
    return [];
  }

  let content: unknown;
  try {
    content = JSON.parse(fs.readFileSync(rulesPath, 'utf-8'));
  } catch (error) {
    throw ConfigError.fromRulesFile(rulesPath, describeError(error));
  }

  try {
    return parseRules(content);
  } catch (error) {
    throw ConfigError.fromRulesFile(rulesPath, describeError(error));
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const configDir = expandHome(env.CONFIG_DIR || DEFAULT_CONFIG_DIR);
  const rulesPath = expandHome(env.RULES_PATH || path.join(configDir, 'rules.json'));

  const policy = (env.LEDGER_ON_CORRUPT || 'reset').trim().toLowerCase();
  if (policy !== 'reset' && policy !== 'fail') {
    throw new ConfigError(`LEDGER_ON_CORRUPT must be "reset" or "fail", got "${policy}"`);
  }

  return {
    flickr: {
      apiKey: env.FLICKR_API_KEY || '',
      apiSecret: env.FLICKR_API_SECRET || '',
      oauthToken: env.FLICKR_OAUTH_TOKEN || '',
      oauthTokenSecret: env.FLICKR_OAUTH_TOKEN_SECRET || '',
      username: env.FLICKR_USERNAME || '',
    },
    exiftoolPath: env.EXIFTOOL_PATH ? expandHome(env.EXIFTOOL_PATH) : undefined,
    configDir,
    rulesPath,
    rules: loadRules(rulesPath),
    storeLedgerInImageDir: parseFlag(env.STORE_LEDGER_IN_IMAGE_DIR, false),
    setDatePosted: parseFlag(env.SET_DATE_POSTED, true),
    ledgerParsePolicy: policy,
    dryRun: parseFlag(env.DRY_RUN, false),
    logLevel: env.LOG_LEVEL || 'info',
  };
}

/**
 * Check that everything needed to upload is configured.
 * Runs before any file is processed.
 */
export function validateConfig(config: Config): void {
  const missing: string[] = [];
  if (!config.flickr.apiKey) missing.push('FLICKR_API_KEY');
  if (!config.flickr.apiSecret) missing.push('FLICKR_API_SECRET');
  if (!config.flickr.oauthToken) missing.push('FLICKR_OAUTH_TOKEN');
  if (!config.flickr.oauthTokenSecret) missing.push('FLICKR_OAUTH_TOKEN_SECRET');

  if (missing.length > 0) {
    throw ConfigError.fromMissing(missing);
  }

  if (config.exiftoolPath && !fs.existsSync(config.exiftoolPath)) {
    throw new ConfigError(`EXIFTOOL_PATH does not exist: ${config.exiftoolPath}`);
  }
}
