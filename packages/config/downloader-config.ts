import type { Feed } from '@podcast-dl/types';
import { DEFAULT_FEEDS } from './rss-config.js';
import {
    DEFAULT_EPISODE_LIMIT,
    DEFAULT_OUTPUT_DIR,
    DEFAULT_REQUEST_TIMEOUT_MS,
} from './constants.js';

/**
 * Everything the download flow needs, passed in explicitly so tests can run
 * against fixture feeds and temporary directories.
 */
export interface DownloaderConfig {
    feeds: readonly Feed[];
    episodeLimit: number;
    outputDir: string;
    requestTimeoutMs: number;
}

export function createDownloaderConfig(overrides: Partial<DownloaderConfig> = {}): DownloaderConfig {
    const config: DownloaderConfig = {
        feeds: DEFAULT_FEEDS,
        episodeLimit: DEFAULT_EPISODE_LIMIT,
        outputDir: DEFAULT_OUTPUT_DIR,
        requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
        ...overrides,
    };

    if (config.feeds.length === 0) {
        throw new Error('At least one feed must be configured');
    }
    if (!Number.isInteger(config.episodeLimit) || config.episodeLimit < 1) {
        throw new Error(`Episode limit must be a positive integer (got ${config.episodeLimit})`);
    }
    if (!Number.isFinite(config.requestTimeoutMs) || config.requestTimeoutMs <= 0) {
        throw new Error(`Request timeout must be a positive number of milliseconds (got ${config.requestTimeoutMs})`);
    }

    return config;
}
