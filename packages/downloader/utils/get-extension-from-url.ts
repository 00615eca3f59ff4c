import path from 'path';
import { FALLBACK_AUDIO_EXTENSION } from '@podcast-dl/config';

const EXTENSION_PATTERN = /^[a-z0-9]{1,5}$/;

/** Lower-cased extension of the media URL's last path segment, e.g. `mp3`. */
export function getExtensionFromUrl(mediaUrl: string): string {
    let pathname: string;
    try {
        pathname = new URL(mediaUrl).pathname;
    } catch {
        pathname = mediaUrl.split(/[?#]/)[0];
    }

    const extension = path.posix.extname(pathname).slice(1).toLowerCase();
    return EXTENSION_PATTERN.test(extension) ? extension : FALLBACK_AUDIO_EXTENSION;
}

export function getEpisodeFilename(sanitizedTitle: string, mediaUrl: string): string {
    return `${sanitizedTitle}.${getExtensionFromUrl(mediaUrl)}`;
}
