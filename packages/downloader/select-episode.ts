import prompts from 'prompts';
import type { Episode, Feed } from '@podcast-dl/types';
import { printInfo } from '@podcast-dl/logging';

/** A declined prompt is an ordinary outcome, not an error. */
export type SelectionResult<T> =
  | { status: 'selected'; value: T }
  | { status: 'cancelled' };

export interface SelectChoice<T> {
  title: string;
  value: T;
  description?: string;
}

/**
 * Arrow-key single choice. Ctrl-C or Esc resolves to `{ status: 'cancelled' }`.
 */
export async function promptSelect<T>(
  message: string,
  choices: readonly SelectChoice<T>[]
): Promise<SelectionResult<T>> {
  let cancelled = false;

  // Indices go through prompts so the chosen value keeps its type
  const response = await prompts(
    {
      type: 'select',
      name: 'choiceIndex',
      message,
      choices: choices.map((choice, index) => ({
        title: choice.title,
        description: choice.description,
        value: index,
      })),
      initial: 0,
    },
    {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    }
  );

  const index: unknown = response.choiceIndex;
  if (cancelled || typeof index !== 'number') {
    return { status: 'cancelled' };
  }

  const choice = choices[index];
  if (!choice) {
    throw new Error(`Prompt returned an unknown choice index: ${index}`);
  }
  return { status: 'selected', value: choice.value };
}

/** The first `limit` episodes, in feed order. */
export function takeEpisodes(episodes: readonly Episode[], limit: number): Episode[] {
  return episodes.slice(0, limit);
}

export function formatEpisodeChoices(episodes: readonly Episode[]): SelectChoice<Episode>[] {
  return episodes.map((episode, index) => ({
    title: `${index + 1}. ${episode.title}`,
    description: episode.pubDate,
    value: episode,
  }));
}

export async function selectFeed(feeds: readonly Feed[]): Promise<SelectionResult<Feed>> {
  if (feeds.length === 0) {
    throw new Error('No feeds configured');
  }

  // If only one feed, use it
  if (feeds.length === 1) {
    printInfo(`Using feed: ${feeds[0].name}`);
    return { status: 'selected', value: feeds[0] };
  }

  return promptSelect(
    'Select a podcast feed:',
    feeds.map(feed => ({ title: feed.name, description: feed.url, value: feed }))
  );
}

export async function selectEpisode(episodes: readonly Episode[]): Promise<SelectionResult<Episode>> {
  return promptSelect('Select an episode to download:', formatEpisodeChoices(episodes));
}
