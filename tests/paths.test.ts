import { describe, it, expect, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { expandOutputPath, formatTimestampToken, writeOutput } from '../src/io/paths';

const iso = '2024-05-01T01:54:00.000Z';

describe('formatTimestampToken', () => {
  it('formats in UTC', () => {
    expect(formatTimestampToken(iso)).toBe('20240501T0154');
  });

  it('converts offsets to UTC', () => {
    expect(formatTimestampToken('2024-12-31T23:30:00-02:00')).toBe('20250101T0130');
  });
});

describe('expandOutputPath', () => {
  it('replaces timestamp and seed tokens', () => {
    expect(
      expandOutputPath('out/report-${seed}-${timestamp}.json', { timestamp: iso, seed: 42 }),
    ).toBe('out/report-42-20240501T0154.json');
  });

  it('drops the seed token when unseeded', () => {
    expect(expandOutputPath('report-${seed}.json', { timestamp: iso })).toBe('report-.json');
  });

  it('leaves plain paths alone', () => {
    expect(expandOutputPath('report.json', { timestamp: iso })).toBe('report.json');
  });
});

describe('writeOutput', () => {
  it('creates parent directories and logs the path', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const path = join(mkdtempSync(join(tmpdir(), 'ds-')), 'nested', 'out.txt');
    writeOutput(path, 'hello');
    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, 'utf8')).toBe('hello');
    expect(log).toHaveBeenCalledWith(`Wrote ${path}`);
    log.mockRestore();
  });
});
