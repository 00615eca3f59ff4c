const BANNER_WIDTH = 50;

function center(text: string, width: number): string {
  const padding = Math.max(0, width - text.length);
  const left = Math.floor(padding / 2);
  return `${' '.repeat(left)}${text}${' '.repeat(padding - left)}`;
}

export function renderBanner(version: string): string {
  const lines = [
    '',
    'P O D C A S T - D L',
    '',
    `Podcast Downloader v${version}`,
    'Download podcast episodes from RSS feeds',
    '',
  ];

  return [
    `╔${'═'.repeat(BANNER_WIDTH)}╗`,
    ...lines.map(line => `║${center(line, BANNER_WIDTH)}║`),
    `╚${'═'.repeat(BANNER_WIDTH)}╝`,
  ].join('\n');
}
