import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { summarizeLevel } from '../../../src/core/trial-aggregator.js';
import { toCsv, writeReports } from '../../../src/report/writers.js';
import type { LevelRun, SweepResult } from '../../../src/types/index.js';

const run: LevelRun = {
  concurrency: 1,
  repetition: 1,
  dispatched: 1,
  startedAt: 0,
  endedAt: 100,
  truncated: false,
  cancelled: 0,
  outcomes: [
    {
      id: 'p-0',
      success: true,
      startedAt: 0,
      endedAt: 100,
      durationMs: 100,
      attempts: 1,
      inputTokens: 5,
      outputTokens: 20,
      statusCode: 200,
      tokensEstimated: false,
      error: null,
    },
  ],
};

const result: SweepResult = {
  startedAt: '2026-01-02T03:04:05.000Z',
  completedAt: '2026-01-02T03:05:00.000Z',
  levels: [summarizeLevel(1, 1, []), summarizeLevel(2, 1, [], 'refused, "twice"')],
  runs: [run],
};

const date = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));

describe('toCsv', () => {
  it('should quote values that need it', () => {
    const csv = toCsv([{ a: 'plain', b: 'with, comma' }, { a: 'say "hi"', b: 'line\nbreak' }], ['a', 'b']);

    expect(csv).toBe('a,b\nplain,"with, comma"\n"say ""hi""","line\nbreak"\n');
  });
});

describe('writeReports', () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'loadtest-reports-'));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('should write summary, raw and JSON reports', async () => {
    const output = join(directory, 'nested');
    const written = await writeReports(result, {
      directory: output,
      formats: ['csv', 'json'],
      concurrencyLevels: [1, 2],
      endpointType: 'openai-chat',
      includeOutcomes: true,
      date,
    });

    expect(written).toEqual([
      join(output, 'scaling_test_20260102_030405_summary.csv'),
      join(output, 'scaling_test_20260102_030405_raw.csv'),
      join(output, 'scaling_test_20260102_030405.json'),
    ]);

    const summary = readFileSync(join(output, 'scaling_test_20260102_030405_summary.csv'), 'utf8').split('\n');
    expect(summary).toHaveLength(4);
    expect(summary[0]?.startsWith('concurrency,mean_response_time,stdev_response_time,')).toBe(true);
    expect(summary[2]).toBe('2,0,0,0,0,0,0,0,0,0,0,0,1,0,"refused, ""twice"""');

    const raw = readFileSync(join(output, 'scaling_test_20260102_030405_raw.csv'), 'utf8').split('\n');
    expect(raw[1]).toBe('1970-01-01T00:00:00.000Z,1,1,p-0,true,200,,0.1,20,5,25,200,1,false,openai-chat');

    const json: unknown = JSON.parse(readFileSync(join(output, 'scaling_test_20260102_030405.json'), 'utf8'));
    expect(json).toMatchObject({ startedAt: result.startedAt, runs: [{ concurrency: 1 }] });
  });

  it('should leave outcomes out unless asked', async () => {
    const written = await writeReports(result, {
      directory,
      formats: ['csv', 'json'],
      concurrencyLevels: [4],
      endpointType: 'openai-chat',
      includeOutcomes: false,
      date,
    });

    expect(written).toEqual([
      join(directory, 'load_test_20260102_030405_c4_summary.csv'),
      join(directory, 'load_test_20260102_030405_c4.json'),
    ]);
    const json: unknown = JSON.parse(readFileSync(join(directory, 'load_test_20260102_030405_c4.json'), 'utf8'));
    expect(json).toMatchObject({ runs: [] });
  });

  it('should raise a ReportError when the directory cannot be created', async () => {
    const blocker = join(directory, 'file');
    writeFileSync(blocker, 'not a directory');

    await expect(
      writeReports(result, {
        directory: join(blocker, 'out'),
        formats: ['csv'],
        concurrencyLevels: [1],
        endpointType: 'openai-chat',
        includeOutcomes: false,
        date,
      })
    ).rejects.toMatchObject({ code: 'ReportError' });
  });
});
