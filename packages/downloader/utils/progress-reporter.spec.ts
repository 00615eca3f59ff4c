import { describe, it, expect, vi } from 'vitest';
import { Writable } from 'stream';
import {
  computeProgressSnapshot,
  describeSnapshot,
  formatBytes,
  formatDuration,
  TerminalProgressReporter,
  type ProgressBarHandle,
} from './progress-reporter.js';

vi.mock('@podcast-dl/logging', () => ({
  log: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

function createCapturingStream() {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    }
  });
  return { stream, lines };
}

function createFakeBar(overrides: Partial<ProgressBarHandle> = {}): ProgressBarHandle {
  return {
    start: vi.fn(),
    update: vi.fn(),
    stop: vi.fn(),
    ...overrides
  };
}

describe('computeProgressSnapshot', () => {
  it('should compute percentage, average rate and ETA when the total is known', () => {
    expect(computeProgressSnapshot(512, 1024, 1000, 3000)).toEqual({
      bytesReceived: 512,
      totalBytes: 1024,
      elapsedMs: 2000,
      percentage: 50,
      bytesPerSecond: 256,
      etaSeconds: 2
    });
  });

  it('should omit percentage and ETA when the total is unknown', () => {
    expect(computeProgressSnapshot(2048, undefined, 0, 1000)).toEqual({
      bytesReceived: 2048,
      elapsedMs: 1000,
      bytesPerSecond: 2048
    });
  });

  it('should report an unknown ETA while the rate is zero', () => {
    const snapshot = computeProgressSnapshot(0, 1000, 5, 5);
    expect(snapshot.bytesPerSecond).toBe(0);
    expect(snapshot.percentage).toBe(0);
    expect(snapshot.etaSeconds).toBeUndefined();
  });

  it('should read 100% with no time remaining once everything has arrived', () => {
    const snapshot = computeProgressSnapshot(1000, 1000, 0, 500);
    expect(snapshot.percentage).toBe(100);
    expect(snapshot.etaSeconds).toBe(0);
  });

  it('should treat an empty body as complete', () => {
    expect(computeProgressSnapshot(0, 0, 0, 10).percentage).toBe(100);
  });
});

describe('formatting helpers', () => {
  it('should format byte counts with binary units', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(1048576)).toBe('1.0 MB');
  });

  it('should format durations as HH:MM:SS', () => {
    expect(formatDuration(3725)).toBe('01:02:05');
    expect(formatDuration(0.9)).toBe('00:00:00');
  });

  it('should describe a snapshot on one line', () => {
    const snapshot = computeProgressSnapshot(512, 1024, 1000, 3000);
    expect(describeSnapshot(snapshot)).toBe(
      'Downloaded 512 B / 1.0 KB (50%) at 256 B/s, elapsed 00:00:02, ETA 00:00:02'
    );
  });

  it('should describe an indeterminate snapshot without a percentage', () => {
    const snapshot = computeProgressSnapshot(2048, undefined, 0, 1000);
    expect(describeSnapshot(snapshot)).toBe(
      'Downloaded 2.0 KB at 2.0 KB/s, elapsed 00:00:01, ETA unknown'
    );
  });
});

describe('TerminalProgressReporter', () => {
  it('should write throttled plain text lines when the stream is not a TTY', () => {
    const { stream, lines } = createCapturingStream();
    let clock = 0;
    const reporter = new TerminalProgressReporter({ stream, now: () => clock, plainIntervalMs: 1000 });

    reporter.start(1000);
    clock = 500;
    reporter.update(250);
    clock = 1000;
    reporter.update(600);
    clock = 1500;
    reporter.update(1000);
    clock = 2000;
    reporter.stop();

    expect(lines).toEqual([
      'Downloaded 600 B / 1000 B (60%) at 600 B/s, elapsed 00:00:01, ETA 00:00:01\n',
      'Downloaded 1000 B / 1000 B (100%) at 500 B/s, elapsed 00:00:02, ETA 00:00:00\n'
    ]);
    expect(reporter.lastSnapshot?.percentage).toBe(100);
  });

  it('should measure elapsed time from the start time it is given', () => {
    const { stream, lines } = createCapturingStream();
    let clock = 1500;
    const reporter = new TerminalProgressReporter({ stream, now: () => clock, plainIntervalMs: 1000 });

    reporter.start(1000, 1000);
    clock = 2000;
    reporter.update(500);

    expect(lines).toEqual([
      'Downloaded 500 B / 1000 B (50%) at 500 B/s, elapsed 00:00:01, ETA 00:00:01\n'
    ]);
  });

  it('should drive the progress bar on an interactive stream', () => {
    const { stream } = createCapturingStream();
    const bar = createFakeBar();
    const createBar = vi.fn(() => bar);
    let clock = 0;
    const reporter = new TerminalProgressReporter({
      stream,
      interactive: true,
      now: () => clock,
      refreshIntervalMs: 200,
      createBar
    });

    reporter.start(100);
    clock = 100;
    reporter.update(10);
    clock = 400;
    reporter.update(100);
    reporter.stop();

    expect(createBar).toHaveBeenCalledWith(stream, true);
    expect(bar.start).toHaveBeenCalledWith(100, 0, expect.objectContaining({ percentText: '0%' }));
    expect(bar.update).toHaveBeenCalledTimes(1);
    expect(bar.update).toHaveBeenCalledWith(100, expect.objectContaining({ percentText: '100%' }));
    expect(bar.stop).toHaveBeenCalledTimes(1);
  });

  it('should run the bar in indeterminate mode without a total', () => {
    const { stream } = createCapturingStream();
    const bar = createFakeBar();
    const createBar = vi.fn(() => bar);
    const reporter = new TerminalProgressReporter({ stream, interactive: true, now: () => 0, createBar });

    reporter.start(undefined);

    expect(createBar).toHaveBeenCalledWith(stream, false);
    expect(bar.start).toHaveBeenCalledWith(1, 0, expect.objectContaining({ percentText: '--%', etaText: 'unknown' }));
  });

  it('should fall back to plain text when the bar fails to render', () => {
    const { stream, lines } = createCapturingStream();
    const bar = createFakeBar({
      update: vi.fn(() => {
        throw new Error('not a terminal');
      })
    });
    let clock = 0;
    const reporter = new TerminalProgressReporter({
      stream,
      interactive: true,
      now: () => clock,
      createBar: () => bar
    });

    reporter.start(100);
    clock = 300;
    expect(() => reporter.update(50)).not.toThrow();
    reporter.stop();

    expect(bar.stop).toHaveBeenCalledTimes(1);
    expect(lines).toEqual([
      'Downloaded 50 B / 100 B (50%) at 167 B/s, elapsed 00:00:00, ETA 00:00:01\n'
    ]);
  });
});
