import { DEFAULT_EPISODE_LIMIT } from '@podcast-dl/config';
import { CliUsageError } from './errors.js';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; episodeLimit: number };

export const USAGE = `Usage: podcast-dl [options]

Download podcast episodes from RSS feeds.

Options:
  -n, --n <count>  Number of episodes to display (default: ${DEFAULT_EPISODE_LIMIT})
  -v, --version    Print version
  -h, --help       Print help`;

function parseEpisodeLimit(value: string | undefined, flag: string): number {
  if (value === undefined || value === '') {
    throw new CliUsageError(`Option ${flag} requires a value`);
  }
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new CliUsageError(`Invalid value for ${flag}: "${value}" (expected a positive integer)`);
  }
  return Number(value);
}

/**
 * Help and version win as soon as they appear; anything unrecognised is a
 * usage error.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  let episodeLimit = DEFAULT_EPISODE_LIMIT;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }
    if (arg === '-v' || arg === '--version') {
      return { kind: 'version' };
    }
    if (arg === '-n' || arg === '--n') {
      episodeLimit = parseEpisodeLimit(argv[i + 1], arg);
      i++;
      continue;
    }

    const inline = arg.match(/^(-n|--n)=(.*)$/) ?? arg.match(/^(-n)(\d.*)$/);
    if (inline) {
      episodeLimit = parseEpisodeLimit(inline[2], inline[1]);
      continue;
    }

    if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    throw new CliUsageError(`Unexpected argument: ${arg}`);
  }

  return { kind: 'run', episodeLimit };
}
