import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Ledger, LEDGER_BASENAME } from './ledger.js';
import { LedgerParseError, LedgerWriteError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

describe('Ledger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('pathFor', () => {
    it('uses a hidden file beside the image when storing in the image directory', () => {
      const ledgerPath = Ledger.pathFor('/photos/2024/IMG_1.jpg', { storeInImageDir: true, configDir: '/cfg' });
      expect(ledgerPath).toBe('/photos/2024/.flickr-uploaded-files.json');
    });

    it('uses the config directory otherwise', () => {
      const ledgerPath = Ledger.pathFor('/photos/2024/IMG_1.jpg', { storeInImageDir: false, configDir: '/cfg' });
      expect(ledgerPath).toBe('/cfg/flickr-uploaded-files.json');
    });
  });

  it('starts empty when the file does not exist', () => {
    const ledger = Ledger.open(path.join(dir, LEDGER_BASENAME));
    expect(ledger.size).toBe(0);
    expect(ledger.lookup('IMG_1.jpg')).toBeUndefined();
  });

  it('looks entries up by base filename', () => {
    const ledgerPath = path.join(dir, LEDGER_BASENAME);
    fs.writeFileSync(ledgerPath, JSON.stringify({ 'IMG_1.jpg': '111' }));

    const ledger = Ledger.open(ledgerPath);
    expect(ledger.lookup('IMG_1.jpg')).toBe('111');
    expect(ledger.lookup('/somewhere/else/IMG_1.jpg')).toBe('111');
  });

  it('keeps the first photo id when recording the same filename twice', () => {
    const ledgerPath = path.join(dir, LEDGER_BASENAME);
    const ledger = Ledger.open(ledgerPath);

    expect(ledger.recordIfAbsent('/photos/IMG_1.jpg', 'first')).toBe(true);
    expect(ledger.recordIfAbsent('/other/IMG_1.jpg', 'second')).toBe(false);

    expect(ledger.lookup('IMG_1.jpg')).toBe('first');
    expect(Ledger.open(ledgerPath).lookup('IMG_1.jpg')).toBe('first');
  });

  it('writes two-space indented JSON keyed by base filename', () => {
    const ledgerPath = path.join(dir, LEDGER_BASENAME);
    const ledger = Ledger.open(ledgerPath);
    ledger.recordIfAbsent('/photos/IMG_1.jpg', '123');

    expect(fs.readFileSync(ledgerPath, 'utf-8')).toBe('{\n  "IMG_1.jpg": "123"\n}');
    expect(fs.existsSync(`${ledgerPath}.tmp`)).toBe(false);
  });

  it('reads back what it wrote', () => {
    const ledgerPath = path.join(dir, LEDGER_BASENAME);
    const ledger = Ledger.open(ledgerPath);
    ledger.recordIfAbsent('b.jpg', '2');
    ledger.recordIfAbsent('a.jpg', '1');
    ledger.recordIfAbsent('c.png', '3');

    expect(Ledger.open(ledgerPath).entries()).toEqual({ 'a.jpg': '1', 'b.jpg': '2', 'c.png': '3' });
  });

  it('creates the config directory on first write', () => {
    const ledgerPath = path.join(dir, 'nested', 'config', LEDGER_BASENAME);
    Ledger.open(ledgerPath).recordIfAbsent('IMG_1.jpg', '9');
    expect(fs.existsSync(ledgerPath)).toBe(true);
  });

  describe('corrupt ledger', () => {
    it('resets to an empty ledger and logs an error by default', () => {
      const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => {});
      const ledgerPath = path.join(dir, LEDGER_BASENAME);
      fs.writeFileSync(ledgerPath, '{ not json');

      const ledger = Ledger.open(ledgerPath);

      expect(ledger.size).toBe(0);
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('rejects values that are not strings', () => {
      vi.spyOn(logger, 'error').mockImplementation(() => {});
      const ledgerPath = path.join(dir, LEDGER_BASENAME);
      fs.writeFileSync(ledgerPath, JSON.stringify({ 'IMG_1.jpg': 123 }));

      expect(() => Ledger.open(ledgerPath, 'fail')).toThrow(LedgerParseError);
      expect(Ledger.open(ledgerPath, 'reset').size).toBe(0);
    });

    it('throws LedgerParseError for a top-level array when failing closed', () => {
      const ledgerPath = path.join(dir, LEDGER_BASENAME);
      fs.writeFileSync(ledgerPath, '["IMG_1.jpg"]');

      expect(() => Ledger.open(ledgerPath, 'fail')).toThrow(LedgerParseError);
    });
  });

  it('reports write failures as LedgerWriteError', () => {
    const blocker = path.join(dir, 'not-a-directory');
    fs.writeFileSync(blocker, '');
    const ledger = Ledger.open(path.join(blocker, LEDGER_BASENAME));

    expect(() => ledger.recordIfAbsent('IMG_1.jpg', '1')).toThrow(LedgerWriteError);
  });

  it('forgets an entry whose write failed so a later record can retry', () => {
    const ledgerDir = path.join(dir, 'ledger');
    fs.writeFileSync(ledgerDir, '');
    const ledgerPath = path.join(ledgerDir, LEDGER_BASENAME);
    const ledger = Ledger.open(ledgerPath);

    expect(() => ledger.recordIfAbsent('IMG_1.jpg', '1')).toThrow(LedgerWriteError);
    expect(ledger.lookup('IMG_1.jpg')).toBeUndefined();
    expect(ledger.size).toBe(0);

    fs.rmSync(ledgerDir);
    expect(ledger.recordIfAbsent('IMG_1.jpg', '1')).toBe(true);
    expect(JSON.parse(fs.readFileSync(ledgerPath, 'utf-8'))).toEqual({ 'IMG_1.jpg': '1' });
  });
});
