export const PODCAST_DL_VERSION = '0.1.0';

export const DEFAULT_EPISODE_LIMIT = 10;

// Relative to the working directory the CLI is started from
export const DEFAULT_OUTPUT_DIR = 'podcast-downloads';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const FALLBACK_AUDIO_EXTENSION = 'mp3';

export const FALLBACK_EPISODE_FILENAME = 'episode';
