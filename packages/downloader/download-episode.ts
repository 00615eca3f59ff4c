import fs from 'fs-extra';
import path from 'path';
import type { Episode } from '@podcast-dl/types';
import { log } from '@podcast-dl/logging';
import { DownloadError } from './errors.js';
import { sanitizeFilename } from './utils/sanitize-filename.js';
import { getEpisodeFilename } from './utils/get-extension-from-url.js';
import { getDeclaredBodyLength, readBodyChunks } from './utils/http.js';
import type { ByteChunkSource, FetchLike } from './utils/http.js';
import type { ProgressReporter } from './utils/progress-reporter.js';

export type DownloadState = 'pending' | 'in-flight' | 'completed' | 'failed';

const ALLOWED_TRANSITIONS: Record<DownloadState, readonly DownloadState[]> = {
  'pending': ['in-flight', 'failed'],
  'in-flight': ['completed', 'failed'],
  'completed': [],
  'failed': [],
};

/**
 * Bookkeeping for one download. Byte counts only move while in flight, and
 * each terminal state is entered at most once.
 */
export class DownloadSession {
  private currentState: DownloadState = 'pending';
  private received = 0;
  private total: number | undefined;
  private started: number | undefined;

  get state(): DownloadState {
    return this.currentState;
  }

  get bytesReceived(): number {
    return this.received;
  }

  get totalBytes(): number | undefined {
    return this.total;
  }

  get startedAt(): number | undefined {
    return this.started;
  }

  begin(totalBytes: number | undefined, startedAt: number): void {
    this.transition('in-flight');
    this.total = totalBytes;
    this.started = startedAt;
  }

  recordChunk(byteLength: number): void {
    if (this.currentState !== 'in-flight') {
      throw new Error(`Cannot record bytes while download is ${this.currentState}`);
    }
    this.received += byteLength;
  }

  complete(): void {
    this.transition('completed');
  }

  fail(): void {
    this.transition('failed');
  }

  private transition(next: DownloadState): void {
    if (!ALLOWED_TRANSITIONS[this.currentState].includes(next)) {
      throw new Error(`Invalid download state transition: ${this.currentState} -> ${next}`);
    }
    this.currentState = next;
  }
}

export interface MediaStream {
  totalBytes?: number;
  chunks: ByteChunkSource;
  /** Releases the underlying body when `chunks` is never read */
  cancel?: () => Promise<void>;
}

export interface DownloadResult {
  state: 'completed';
  filePath: string;
  bytesReceived: number;
  totalBytes?: number;
}

export interface WriteChunksOptions {
  url: string;
  destinationPath: string;
  reporter: ProgressReporter;
  now?: () => number;
}

async function releaseUnreadMedia(media: MediaStream): Promise<void> {
  try {
    await media.cancel?.();
  } catch (error) {
    log.debug('Response body could not be cancelled:', error);
  }
}

async function writeChunk(fd: number, chunk: Uint8Array): Promise<void> {
  let offset = 0;
  while (offset < chunk.byteLength) {
    const { bytesWritten } = await fs.write(fd, chunk, offset, chunk.byteLength - offset);
    offset += bytesWritten;
  }
}

/**
 * Fold a chunk stream into `destinationPath`, reporting cumulative bytes after
 * every chunk. The file is created or truncated first and is closed on every
 * path out; a failed download leaves the partial file behind.
 */
export async function writeChunksToFile(
  media: MediaStream,
  { url, destinationPath, reporter, now = Date.now }: WriteChunksOptions
): Promise<DownloadResult> {
  const session = new DownloadSession();

  let fd: number;
  try {
    fd = await fs.open(destinationPath, 'w');
  } catch (error) {
    session.fail();
    await releaseUnreadMedia(media);
    throw new DownloadError(url, destinationPath, `Failed to create output file ${destinationPath}`, { cause: error });
  }

  session.begin(media.totalBytes, now());
  reporter.start(media.totalBytes, session.startedAt);

  try {
    for await (const chunk of media.chunks) {
      try {
        await writeChunk(fd, chunk);
      } catch (error) {
        throw new DownloadError(url, destinationPath, `Failed to write to ${destinationPath}`, {
          cause: error,
          bytesReceived: session.bytesReceived,
        });
      }
      session.recordChunk(chunk.byteLength);
      reporter.update(session.bytesReceived);
    }

    if (media.totalBytes !== undefined && session.bytesReceived < media.totalBytes) {
      throw new DownloadError(
        url,
        destinationPath,
        `Connection closed after ${session.bytesReceived} of ${media.totalBytes} bytes`,
        { bytesReceived: session.bytesReceived }
      );
    }

    session.complete();
  } catch (error) {
    session.fail();
    if (error instanceof DownloadError) {
      throw error;
    }
    throw new DownloadError(url, destinationPath, `Download interrupted after ${session.bytesReceived} bytes`, {
      cause: error,
      bytesReceived: session.bytesReceived,
    });
  } finally {
    reporter.stop();
    await fs.close(fd);
  }

  log.debug(`Wrote ${session.bytesReceived} bytes to ${destinationPath}`);

  return {
    state: 'completed',
    filePath: destinationPath,
    bytesReceived: session.bytesReceived,
    totalBytes: media.totalBytes,
  };
}

export async function openMediaStream(
  url: string,
  destinationPath: string,
  fetchImpl: FetchLike
): Promise<MediaStream> {
  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (error) {
    throw new DownloadError(url, destinationPath, 'Failed to start download', { cause: error });
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new DownloadError(url, destinationPath, `HTTP error! status: ${response.status}`);
  }

  const body = response.body;
  return {
    totalBytes: getDeclaredBodyLength(response.headers),
    chunks: readBodyChunks(body),
    cancel: async () => {
      await body?.cancel();
    },
  };
}

export interface DownloadEpisodeOptions {
  outputDir: string;
  reporter: ProgressReporter;
  fetchImpl?: FetchLike;
  now?: () => number;
}

export function getEpisodeDestination(episode: Episode, outputDir: string): string {
  return path.join(outputDir, getEpisodeFilename(sanitizeFilename(episode.title), episode.mediaUrl));
}

/**
 * Download one episode into `outputDir`, creating the directory first.
 */
export async function downloadEpisode(
  episode: Episode,
  { outputDir, reporter, fetchImpl = fetch, now }: DownloadEpisodeOptions
): Promise<DownloadResult> {
  const destinationPath = getEpisodeDestination(episode, outputDir);

  try {
    await fs.ensureDir(outputDir);
  } catch (error) {
    throw new DownloadError(episode.mediaUrl, destinationPath, `Failed to create download directory ${outputDir}`, {
      cause: error,
    });
  }

  log.debug(`Downloading "${episode.title}" from ${episode.mediaUrl} to ${destinationPath}`);
  const media = await openMediaStream(episode.mediaUrl, destinationPath, fetchImpl);

  return writeChunksToFile(media, { url: episode.mediaUrl, destinationPath, reporter, now });
}
