import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadDecoderConfig } from '../../src/config.js';
import type { DecoderConfig } from '../../src/config.js';
import { runDecodeCommand, USAGE } from '../../src/interfaces/cli/decode-command.js';
import { captureLogger, logOf, SAMPLE_LOG } from '../helpers.js';

const ERROR = 50;

function run(paths: string[], overrides: Partial<DecoderConfig> = {}) {
  const { log, entries } = captureLogger('info');
  const lines: string[] = [];
  const config = { ...loadDecoderConfig({}), ...overrides };

  const exitCode = runDecodeCommand(paths, {
    config,
    log,
    write: (line) => {
      lines.push(line);
    },
  });

  return { exitCode, lines, entries: entries() };
}

describe('runDecodeCommand', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'decode-command-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('prints usage and exits with 2 without files', () => {
    const { exitCode, lines, entries } = run([]);

    expect(exitCode).toBe(2);
    expect(lines).toEqual([]);
    expect(entries.map((entry) => [entry.level, entry.msg])).toEqual([[ERROR, USAGE]]);
  });

  it('writes one JSON line per event', () => {
    const { exitCode, lines, entries } = run([SAMPLE_LOG]);

    expect(exitCode).toBe(0);
    expect(lines).toHaveLength(3);

    const first = JSON.parse(lines[0] ?? '');
    expect(first.metadata.logName).toBe(SAMPLE_LOG);
    expect(first.metadata).not.toHaveProperty('rawEvent');
    expect(first.event.eventID).toBe('0b1f6f0e-6d3e-4c5b-9a0e-7f1d2c3b4a50');
    expect(first.event.eventTime).toBe('2024-05-01T12:00:00.000Z');
    expect(first.event.accountId).toBe('111122223333');
    expect(first.event.readOnly).toBe(true);

    const done = entries.find((entry) => entry.msg === 'Log decoded');
    expect(done?.['decoded']).toBe(3);
    expect(done?.['logName']).toBe(SAMPLE_LOG);
  });

  it('includes the source text of each record in raw mode', () => {
    const record = '{"eventName":"A","eventTime":"2024-05-01T12:00:00Z"}';
    const path = join(dir, 'raw.json');
    writeFileSync(path, logOf(record));

    const { exitCode, lines } = run([path], { rawEventInfo: true });

    expect(exitCode).toBe(0);
    expect(JSON.parse(lines[0] ?? '').metadata).toEqual({
      logName: path,
      charStart: 12,
      charEnd: 12 + record.length,
      rawEvent: record,
    });
    expect(readFileSync(path, 'utf-8').slice(12, 12 + record.length)).toBe(record);
  });

  it('keeps going after a file fails and exits with 1', () => {
    const broken = join(dir, 'broken.json');
    writeFileSync(broken, logOf('{"eventName":"A"}', '{"eventID":"bad"}'));
    const missing = join(dir, 'missing.json');

    const { exitCode, lines, entries } = run([broken, missing, SAMPLE_LOG]);

    expect(exitCode).toBe(1);
    expect(lines).toHaveLength(1 + 3);
    expect(JSON.parse(lines[0] ?? '').event).toEqual({ eventName: 'A' });

    const failures = entries.filter((entry) => entry.level === ERROR);
    expect(failures.map((entry) => [entry['logName'], entry['decoded'], entry.msg])).toEqual([
      [broken, 1, 'Failed to decode log'],
      [missing, 0, 'Failed to decode log'],
    ]);
  });

  it('applies the configured records field', () => {
    const path = join(dir, 'items.json');
    writeFileSync(path, '{"Items":[{"eventName":"A"},{"eventName":"B"}]}');

    const { exitCode, lines } = run([path], { recordsField: 'Items' });

    expect(exitCode).toBe(0);
    expect(lines.map((line) => JSON.parse(line).event.eventName)).toEqual(['A', 'B']);
  });
});
