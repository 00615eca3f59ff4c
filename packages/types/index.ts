export type { Feed, Episode } from './podcast.js';
