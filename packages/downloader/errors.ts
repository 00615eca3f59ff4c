export type FailureStage = 'fetch' | 'download';

/**
 * Base for failures that end a run. `stage` names the step that failed so the
 * top level can report it without inspecting message text.
 */
export class PodcastDownloaderError extends Error {
  readonly stage: FailureStage;

  constructor(stage: FailureStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PodcastDownloaderError';
    this.stage = stage;
  }
}

/** Network, HTTP status or feed document failure while retrieving a feed. */
export class FetchError extends PodcastDownloaderError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options: { cause?: unknown; status?: number } = {}) {
    super('fetch', `${message} (${url})`, { cause: options.cause });
    this.name = 'FetchError';
    this.url = url;
    this.status = options.status;
  }
}

/**
 * Failure while streaming an episode to disk. Whatever was written before the
 * failure stays at `destinationPath`.
 */
export class DownloadError extends PodcastDownloaderError {
  readonly url: string;
  readonly destinationPath: string;
  readonly bytesReceived: number;

  constructor(
    url: string,
    destinationPath: string,
    message: string,
    options: { cause?: unknown; bytesReceived?: number } = {}
  ) {
    super('download', message, { cause: options.cause });
    this.name = 'DownloadError';
    this.url = url;
    this.destinationPath = destinationPath;
    this.bytesReceived = options.bytesReceived ?? 0;
  }
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const MAX_CAUSE_DEPTH = 3;

/** The error message followed by the messages of its causes, e.g. `Failed to fetch RSS feed (url): fetch failed`. */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const messages = [error.message];
  let cause: unknown = error.cause;
  while (cause instanceof Error && messages.length <= MAX_CAUSE_DEPTH) {
    messages.push(cause.message);
    cause = cause.cause;
  }
  return messages.join(': ');
}
