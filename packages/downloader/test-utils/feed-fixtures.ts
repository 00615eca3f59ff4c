export interface FixtureItem {
  title?: string;
  url?: string;
  length?: number;
  pubDate?: string;
  description?: string;
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;');
}

function renderItem(item: FixtureItem): string {
  const parts = ['<item>'];
  if (item.title !== undefined) parts.push(`<title><![CDATA[${item.title}]]></title>`);
  if (item.pubDate !== undefined) parts.push(`<pubDate>${item.pubDate}</pubDate>`);
  if (item.description !== undefined) parts.push(`<description><![CDATA[${item.description}]]></description>`);
  if (item.url !== undefined) {
    const length = item.length !== undefined ? ` length="${item.length}"` : '';
    parts.push(`<enclosure url="${escapeAttribute(item.url)}"${length} type="audio/mpeg"/>`);
  }
  parts.push('</item>');
  return parts.join('');
}

export function buildFeedXml(items: FixtureItem[], channelTitle = 'Cozy Up (Doctor)'): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<rss version="2.0" xmlns:itunes="http://www.itunes.com/dtds/podcast-1.0.dtd">',
    '<channel>',
    `<title>${channelTitle}</title>`,
    ...items.map(renderItem),
    '</channel>',
    '</rss>',
  ].join('\n');
}

export function textResponse(body: string, init: { status?: number; headers?: Record<string, string> } = {}): Response {
  return new Response(body, { status: init.status ?? 200, headers: init.headers });
}
