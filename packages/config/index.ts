export { DEFAULT_FEEDS } from './rss-config.js';
export { createDownloaderConfig } from './downloader-config.js';
export type { DownloaderConfig } from './downloader-config.js';
export {
    PODCAST_DL_VERSION,
    DEFAULT_EPISODE_LIMIT,
    DEFAULT_OUTPUT_DIR,
    DEFAULT_REQUEST_TIMEOUT_MS,
    FALLBACK_AUDIO_EXTENSION,
    FALLBACK_EPISODE_FILENAME,
} from './constants.js';
