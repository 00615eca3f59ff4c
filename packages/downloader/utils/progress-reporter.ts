import cliProgress from 'cli-progress';
import { log } from '@podcast-dl/logging';

export interface ProgressSnapshot {
  bytesReceived: number;
  totalBytes?: number;
  elapsedMs: number;
  /** 0-100, only when the total is known */
  percentage?: number;
  /** Average since the download started */
  bytesPerSecond: number;
  /** Only when the total is known and bytes are arriving */
  etaSeconds?: number;
}

export function computeProgressSnapshot(
  bytesReceived: number,
  totalBytes: number | undefined,
  startedAt: number,
  now: number
): ProgressSnapshot {
  const elapsedMs = Math.max(0, now - startedAt);
  const bytesPerSecond = elapsedMs > 0 ? bytesReceived / (elapsedMs / 1000) : 0;

  if (totalBytes === undefined) {
    return { bytesReceived, elapsedMs, bytesPerSecond };
  }

  const percentage = totalBytes > 0
    ? Math.min(100, Math.floor((bytesReceived * 100) / totalBytes))
    : 100;
  const remaining = Math.max(0, totalBytes - bytesReceived);
  const etaSeconds = bytesPerSecond > 0 ? Math.ceil(remaining / bytesPerSecond) : undefined;

  return { bytesReceived, totalBytes, elapsedMs, percentage, bytesPerSecond, etaSeconds };
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < BYTE_UNITS.length - 1) {
    value /= 1024;
    unitIndex++;
  }
  return unitIndex === 0 ? `${value} B` : `${value.toFixed(1)} ${BYTE_UNITS[unitIndex]}`;
}

/** HH:MM:SS */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds % 60)}`;
}

export function describeSnapshot(snapshot: ProgressSnapshot): string {
  const transferred = snapshot.totalBytes === undefined
    ? formatBytes(snapshot.bytesReceived)
    : `${formatBytes(snapshot.bytesReceived)} / ${formatBytes(snapshot.totalBytes)} (${snapshot.percentage}%)`;
  const eta = snapshot.etaSeconds === undefined ? 'unknown' : formatDuration(snapshot.etaSeconds);

  return `Downloaded ${transferred} at ${formatBytes(Math.round(snapshot.bytesPerSecond))}/s, elapsed ${formatDuration(snapshot.elapsedMs / 1000)}, ETA ${eta}`;
}

/**
 * Receives cumulative byte counts from the downloader. Implementations must not
 * throw: a display problem is never a reason to abort a download.
 */
export interface ProgressReporter {
  /** `startedAt` is the download's own clock reading; defaults to now */
  start(totalBytes: number | undefined, startedAt?: number): void;
  update(bytesReceived: number): void;
  stop(): void;
}

interface ProgressPayload {
  elapsedText: string;
  percentText: string;
  transferredText: string;
  rateText: string;
  etaText: string;
}

export interface ProgressBarHandle {
  start(total: number, startValue: number, payload: ProgressPayload): void;
  update(current: number, payload: ProgressPayload): void;
  stop(): void;
}

export type ProgressOutputStream = NodeJS.WritableStream & { isTTY?: boolean };

export interface TerminalProgressReporterOptions {
  stream?: ProgressOutputStream;
  /** Use the animated bar. Defaults to whether `stream` is a TTY. */
  interactive?: boolean;
  now?: () => number;
  /** Minimum gap between bar redraws */
  refreshIntervalMs?: number;
  /** Minimum gap between lines in plain text mode */
  plainIntervalMs?: number;
  createBar?: (stream: ProgressOutputStream, hasTotal: boolean) => ProgressBarHandle;
}

const DETERMINATE_FORMAT = '[{elapsedText}] [{bar}] {percentText} | {transferredText} | {rateText} | ETA {etaText}';
const INDETERMINATE_FORMAT = '[{elapsedText}] {transferredText} | {rateText} | ETA {etaText}';

function createCliProgressBar(stream: ProgressOutputStream, hasTotal: boolean): ProgressBarHandle {
  return new cliProgress.SingleBar(
    {
      format: hasTotal ? DETERMINATE_FORMAT : INDETERMINATE_FORMAT,
      stream,
      hideCursor: true,
      barsize: 40,
      clearOnComplete: false,
    },
    cliProgress.Presets.legacy
  );
}

function toPayload(snapshot: ProgressSnapshot): ProgressPayload {
  return {
    elapsedText: formatDuration(snapshot.elapsedMs / 1000),
    percentText: snapshot.percentage === undefined ? '--%' : `${snapshot.percentage}%`,
    transferredText: snapshot.totalBytes === undefined
      ? formatBytes(snapshot.bytesReceived)
      : `${formatBytes(snapshot.bytesReceived)}/${formatBytes(snapshot.totalBytes)}`,
    rateText: `${formatBytes(Math.round(snapshot.bytesPerSecond))}/s`,
    etaText: snapshot.etaSeconds === undefined ? 'unknown' : formatDuration(snapshot.etaSeconds),
  };
}

/**
 * Draws a cli-progress bar on interactive terminals and falls back to periodic
 * plain text lines otherwise, or as soon as the bar fails to render.
 */
export class TerminalProgressReporter implements ProgressReporter {
  private readonly stream: ProgressOutputStream;
  private readonly now: () => number;
  private readonly refreshIntervalMs: number;
  private readonly plainIntervalMs: number;
  private readonly createBar: (stream: ProgressOutputStream, hasTotal: boolean) => ProgressBarHandle;

  private interactive: boolean;
  private bar: ProgressBarHandle | null = null;
  private totalBytes: number | undefined;
  private startedAt = 0;
  private bytesReceived = 0;
  private lastRenderAt = Number.NEGATIVE_INFINITY;
  private lastRenderedBytes = -1;
  private snapshot: ProgressSnapshot | null = null;

  constructor(options: TerminalProgressReporterOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.interactive = options.interactive ?? this.stream.isTTY === true;
    this.now = options.now ?? Date.now;
    this.refreshIntervalMs = options.refreshIntervalMs ?? 200;
    this.plainIntervalMs = options.plainIntervalMs ?? 1000;
    this.createBar = options.createBar ?? createCliProgressBar;
  }

  /** The most recently rendered state, or null before the first render. */
  get lastSnapshot(): ProgressSnapshot | null {
    return this.snapshot;
  }

  start(totalBytes: number | undefined, startedAt: number = this.now()): void {
    this.totalBytes = totalBytes;
    this.startedAt = startedAt;
    this.bytesReceived = 0;

    const snapshot = computeProgressSnapshot(0, totalBytes, this.startedAt, this.startedAt);
    this.snapshot = snapshot;

    if (this.interactive) {
      this.withBarFallback(() => {
        this.bar = this.createBar(this.stream, totalBytes !== undefined);
        this.bar.start(totalBytes ?? 1, 0, toPayload(snapshot));
      });
    }
    this.lastRenderAt = this.startedAt;
    this.lastRenderedBytes = 0;
  }

  update(bytesReceived: number): void {
    this.bytesReceived = bytesReceived;
    const now = this.now();
    const interval = this.interactive ? this.refreshIntervalMs : this.plainIntervalMs;
    if (now - this.lastRenderAt < interval) {
      return;
    }
    this.render(now);
  }

  stop(): void {
    if (this.lastRenderedBytes !== this.bytesReceived || this.snapshot === null) {
      this.render(this.now());
    }
    const bar = this.bar;
    this.bar = null;
    if (bar) {
      this.withBarFallback(() => bar.stop());
    }
  }

  private render(now: number): void {
    const snapshot = computeProgressSnapshot(this.bytesReceived, this.totalBytes, this.startedAt, now);
    this.snapshot = snapshot;
    this.lastRenderAt = now;
    this.lastRenderedBytes = this.bytesReceived;

    const bar = this.bar;
    if (this.interactive && bar) {
      this.withBarFallback(() => bar.update(this.totalBytes === undefined ? 0 : snapshot.bytesReceived, toPayload(snapshot)));
    }
    if (!this.interactive) {
      this.writePlainLine(snapshot);
    }
  }

  private withBarFallback(draw: () => void): void {
    try {
      draw();
    } catch (error) {
      log.debug('Progress bar failed to render, switching to plain output:', error);
      this.interactive = false;
      const failedBar = this.bar;
      this.bar = null;
      if (failedBar) {
        try {
          failedBar.stop();
        } catch (stopError) {
          log.debug('Progress bar failed to stop:', stopError);
        }
      }
    }
  }

  private writePlainLine(snapshot: ProgressSnapshot): void {
    try {
      this.stream.write(`${describeSnapshot(snapshot)}\n`);
    } catch (error) {
      log.debug('Could not write progress line:', error);
    }
  }
}
