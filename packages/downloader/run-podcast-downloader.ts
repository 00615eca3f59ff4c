import type { Episode, Feed } from '@podcast-dl/types';
import type { DownloaderConfig } from '@podcast-dl/config';
import { printInfo, printProgress, printSuccess, printWarning } from '@podcast-dl/logging';
import { fetchEpisodes } from './fetch-episodes.js';
import { selectEpisode, selectFeed, takeEpisodes } from './select-episode.js';
import type { SelectionResult } from './select-episode.js';
import { downloadEpisode } from './download-episode.js';
import type { DownloadResult } from './download-episode.js';
import { TerminalProgressReporter } from './utils/progress-reporter.js';
import type { ProgressReporter } from './utils/progress-reporter.js';
import type { FetchLike } from './utils/http.js';

export type RunOutcome =
  | { status: 'downloaded'; feed: Feed; episode: Episode; result: DownloadResult }
  | { status: 'no-episodes'; feed: Feed }
  | { status: 'cancelled' };

export interface RunDependencies {
  fetchImpl?: FetchLike;
  reporter?: ProgressReporter;
  chooseFeed?: (feeds: readonly Feed[]) => Promise<SelectionResult<Feed>>;
  chooseEpisode?: (episodes: readonly Episode[]) => Promise<SelectionResult<Episode>>;
}

/**
 * Pick a feed, fetch it, pick an episode, download it. Each step finishes
 * before the next starts and any failure ends the run.
 */
export async function runPodcastDownloader(
  config: DownloaderConfig,
  {
    fetchImpl = fetch,
    reporter = new TerminalProgressReporter(),
    chooseFeed = selectFeed,
    chooseEpisode = selectEpisode,
  }: RunDependencies = {}
): Promise<RunOutcome> {
  const feedSelection = await chooseFeed(config.feeds);
  if (feedSelection.status === 'cancelled') {
    return { status: 'cancelled' };
  }
  const feed = feedSelection.value;

  printProgress(`Fetching RSS feed for ${feed.name}...`);
  const allEpisodes = await fetchEpisodes(feed.url, { fetchImpl, timeoutMs: config.requestTimeoutMs });
  const episodes = takeEpisodes(allEpisodes, config.episodeLimit);

  if (episodes.length === 0) {
    printWarning('No episodes found in the feed.');
    return { status: 'no-episodes', feed };
  }

  const episodeSelection = await chooseEpisode(episodes);
  if (episodeSelection.status === 'cancelled') {
    return { status: 'cancelled' };
  }
  const episode = episodeSelection.value;

  printInfo(`Downloading: ${episode.title}`);
  const result = await downloadEpisode(episode, { outputDir: config.outputDir, reporter, fetchImpl });

  printSuccess('Download complete!');
  printInfo(`Saved to: ${result.filePath}`);

  return { status: 'downloaded', feed, episode, result };
}
