import type { ReadableStream } from 'stream/web';
import { log } from '@podcast-dl/logging';

/** The subset of `fetch` the downloader relies on. */
export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

/** A lazy, finite, non-restartable sequence of byte chunks. */
export type ByteChunkSource = AsyncIterable<Uint8Array>;

/**
 * Total size of the decoded body, or undefined when the server did not declare
 * one. A compressed body's content-length describes the wire size, which is
 * not what ends up on disk, so it is ignored.
 */
export function getDeclaredBodyLength(headers: Headers): number | undefined {
  const encoding = headers.get('content-encoding');
  if (encoding && encoding.toLowerCase() !== 'identity') {
    return undefined;
  }

  const contentLength = headers.get('content-length')?.trim();
  if (!contentLength || !/^\d+$/.test(contentLength)) {
    return undefined;
  }
  return Number(contentLength);
}

export async function* readBodyChunks(body: ReadableStream<Uint8Array> | null): ByteChunkSource {
  if (!body) {
    return;
  }

  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!finished) {
      // Consumer stopped early or the stream errored: release the connection
      try {
        await reader.cancel();
      } catch (error) {
        log.debug('Response body could not be cancelled:', error);
      }
    }
    reader.releaseLock();
  }
}
