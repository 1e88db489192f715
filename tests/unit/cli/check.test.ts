import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runCheck } from '../../../src/cli/commands/check.js';
import { Logger } from '../../../src/utils/logger.js';

describe('runCheck', () => {
  let dir: string;
  let lines: string[];
  let log: Logger;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'phrasecards-check-'));
    lines = [];
    log = new Logger({ colors: false, sink: { write: (chunk: string) => lines.push(chunk) } });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeCsv(content: string): string {
    const path = join(dir, 'cards.csv');
    writeFileSync(path, content);
    return path;
  }

  it('should summarize a valid file', async () => {
    const path = writeCsv('Russian,English,Phrase in Russian,Phrase in English\r\nдом,house,Мой дом.,My house.\r\n');

    await expect(runCheck(path, {}, log)).resolves.toBe(0);
    expect(lines).toEqual([`[INFO] 1 valid cards, 0 invalid rows in ${path}\n`]);
  });

  it('should warn about every invalid row', async () => {
    const path = writeCsv('h1,h2,h3,h4\nдом,house\nкот,cat,Кот спит.,The cat sleeps.\n');

    await expect(runCheck(path, {}, log)).resolves.toBe(0);
    expect(lines).toEqual([
      `[WARN] Ignoring an invalid row 2 in ${path}: ["дом","house"]\n`,
      `[INFO] 1 valid cards, 1 invalid rows in ${path}\n`,
    ]);
  });

  it('should exit with 1 on invalid rows in strict mode', async () => {
    const path = writeCsv('h1,h2,h3,h4\nдом,house\n');

    await expect(runCheck(path, { strict: true }, log)).resolves.toBe(1);
  });

  it('should warn about an empty file', async () => {
    const path = writeCsv('');

    await expect(runCheck(path, {}, log)).resolves.toBe(0);
    expect(lines).toEqual([`[WARN] ${path} is empty\n`, `[INFO] 0 valid cards, 0 invalid rows in ${path}\n`]);
  });

  it('should exit with 1 when the file does not exist', async () => {
    const path = join(dir, 'missing.csv');

    await expect(runCheck(path, {}, log)).resolves.toBe(1);
    expect(lines).toEqual([`[ERROR] ${path} does not exist\n`]);
  });

  it('should report blank lines as invalid rows', async () => {
    const path = writeCsv('h1,h2,h3,h4\n\nкот,cat,Кот спит.,The cat sleeps.\n');

    await expect(runCheck(path, {}, log)).resolves.toBe(0);
    expect(lines).toEqual([
      `[WARN] Ignoring an invalid row 2 in ${path}: []\n`,
      `[INFO] 1 valid cards, 1 invalid rows in ${path}\n`,
    ]);
  });
});
