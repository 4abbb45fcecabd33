// Image MIME type detection from file extensions

import path from 'path';

const IMAGE_MIME_TYPES: Record<string, string> = {
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.jpe': 'image/jpeg',
    '.gif': 'image/gif',
    '.webp': 'image/webp',
    '.avif': 'image/avif',
    '.svg': 'image/svg+xml',
    '.tif': 'image/tiff',
    '.tiff': 'image/tiff',
    '.bmp': 'image/bmp',
    '.ico': 'image/vnd.microsoft.icon',
    '.heic': 'image/heic',
    '.heif': 'image/heif',
};

/**
 * Returns the image MIME type for a file name, or null when it is not a known image type.
 */
export function guessImageMimeType(filePath: string): string | null {
    const ext = path.extname(filePath).toLowerCase();
    return IMAGE_MIME_TYPES[ext] ?? null;
}
