/** A named source URL publishing an RSS document of episodes. */
export interface Feed {
  name: string;
  url: string;
}

/**
 * One entry in a feed. Produced transiently while parsing a feed response and
 * never persisted.
 */
export interface Episode {
  title: string;
  mediaUrl: string;
  pubDate?: string;
  description?: string;
  /** Byte length declared on the `<enclosure>` element, when the feed provides one. */
  enclosureLength?: number;
}
