import * as xml2js from 'xml2js';
import type { Episode } from '@podcast-dl/types';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '@podcast-dl/config';
import { log } from '@podcast-dl/logging';
import { FetchError } from './errors.js';
import type { FetchLike } from './utils/http.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// With explicitArray: false a repeated element is an array and a single one is not
function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

// Text content is either a plain string or, when the element has attributes, under the '_' charkey
function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim();
  if (isRecord(value) && typeof value._ === 'string') return value._.trim();
  return undefined;
}

function parseEnclosureLength(value: unknown): number | undefined {
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) return undefined;
  const length = Number(value.trim());
  return length > 0 ? length : undefined;
}

function toEpisode(item: unknown, index: number): Episode | null {
  if (!isRecord(item)) {
    log.warn(`Skipping feed item #${index + 1}: not an element`);
    return null;
  }

  const title = textOf(item.title);
  if (!title) {
    log.warn(`Skipping feed item #${index + 1} due to missing title.`);
    return null;
  }

  // Attributes are merged directly onto the enclosure object due to mergeAttrs: true
  const enclosure = asArray(item.enclosure).find(isRecord);
  const mediaUrl = enclosure && typeof enclosure.url === 'string' ? enclosure.url.trim() : '';
  if (!enclosure || !mediaUrl) {
    log.warn(`Skipping episode "${title}" due to missing or invalid enclosure/URL.`);
    return null;
  }

  const episode: Episode = { title, mediaUrl };
  const pubDate = textOf(item.pubDate);
  if (pubDate) episode.pubDate = pubDate;
  const description = textOf(item['itunes:summary']) || textOf(item.description);
  if (description) episode.description = description;
  const enclosureLength = parseEnclosureLength(enclosure.length);
  if (enclosureLength !== undefined) episode.enclosureLength = enclosureLength;

  return episode;
}

/**
 * Parse an RSS document into episodes, keeping feed order. Items without a
 * title or an enclosure URL are skipped.
 */
export async function parseRSSFeed(xmlContent: string, feedUrl: string): Promise<Episode[]> {
  const parser = new xml2js.Parser({
    explicitArray: false,
    charkey: '_',
    mergeAttrs: true,
  });

  let parsed: unknown;
  try {
    parsed = await parser.parseStringPromise(xmlContent);
  } catch (error) {
    throw new FetchError(feedUrl, 'Failed to parse RSS feed', { cause: error });
  }

  const channel = isRecord(parsed) && isRecord(parsed.rss) ? parsed.rss.channel : undefined;
  if (!isRecord(channel)) {
    throw new FetchError(feedUrl, 'Feed document has no <rss><channel> element');
  }

  const episodes: Episode[] = [];
  asArray(channel.item).forEach((item, index) => {
    const episode = toEpisode(item, index);
    if (episode) {
      episodes.push(episode);
    }
  });

  log.debug(`Parsed ${episodes.length} episode(s) from ${feedUrl}`);
  return episodes;
}

export interface FetchFeedOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

// Fetch RSS feed
export async function fetchRSSFeed(
  url: string,
  { fetchImpl = fetch, timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS }: FetchFeedOptions = {}
): Promise<string> {
  let response: Response;
  try {
    response = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    const timedOut = error instanceof Error && error.name === 'TimeoutError';
    throw new FetchError(url, timedOut ? `Timed out after ${timeoutMs} ms` : 'Failed to fetch RSS feed', {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new FetchError(url, `HTTP error! status: ${response.status}`, { status: response.status });
  }

  try {
    return await response.text();
  } catch (error) {
    throw new FetchError(url, 'Failed to read RSS feed response', { cause: error });
  }
}

/** One request, one parse; every failure surfaces as a FetchError. */
export async function fetchEpisodes(url: string, options: FetchFeedOptions = {}): Promise<Episode[]> {
  const xmlContent = await fetchRSSFeed(url, options);
  return parseRSSFeed(xmlContent, url);
}
