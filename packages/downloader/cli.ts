import { createDownloaderConfig, PODCAST_DL_VERSION } from '@podcast-dl/config';
import type { DownloaderConfig } from '@podcast-dl/config';
import { log, printError, printInfo } from '@podcast-dl/logging';
import { renderBanner } from './banner.js';
import { parseCliArgs, USAGE } from './cli-args.js';
import type { CliCommand } from './cli-args.js';
import { CliUsageError, PodcastDownloaderError, describeError } from './errors.js';
import { runPodcastDownloader } from './run-podcast-downloader.js';
import type { RunDependencies } from './run-podcast-downloader.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const STAGE_LABELS = {
  fetch: 'Fetching feed',
  download: 'Download',
} as const;

export function formatFailure(error: unknown): string {
  if (error instanceof PodcastDownloaderError) {
    return `${STAGE_LABELS[error.stage]} failed: ${describeError(error)}`;
  }
  return `Unexpected error: ${describeError(error)}`;
}

export interface CliOptions extends RunDependencies {
  /** Merged over the defaults; `-n` from the command line still wins */
  configOverrides?: Partial<DownloaderConfig>;
}

/**
 * Runs one invocation and resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], { configOverrides, ...dependencies }: CliOptions = {}): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      printError(error.message);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return EXIT_SUCCESS;
  }
  if (command.kind === 'version') {
    console.log(`podcast-dl ${PODCAST_DL_VERSION}`);
    return EXIT_SUCCESS;
  }

  console.log(renderBanner(PODCAST_DL_VERSION));

  try {
    const config = createDownloaderConfig({ ...configOverrides, episodeLimit: command.episodeLimit });
    const outcome = await runPodcastDownloader(config, dependencies);

    if (outcome.status === 'cancelled') {
      printInfo('Selection cancelled.');
    }
    return EXIT_SUCCESS;
  } catch (error) {
    log.debug('Run failed:', error);
    printError(formatFailure(error));
    return EXIT_FAILURE;
  }
}
