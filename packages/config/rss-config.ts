import type { Feed } from '@podcast-dl/types';

/**
 * Feeds offered when no other list is supplied. Order here is the order shown
 * in the feed selection prompt.
 */
export const DEFAULT_FEEDS: readonly Feed[] = [
    {
        name: 'Cozy Up (Doctor)',
        url: 'https://omny.fm/shows/cozy-up/playlists/doctor.rss',
    },
];
