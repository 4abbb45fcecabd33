import path from 'path';
import sharp from 'sharp';
import { IImageEncoder } from '../../domain/ports/IImageEncoder';
import { ILogger } from '../../domain/ports/ILogger';
import { getErrorMessage } from '../../domain/errors/PublishErrors';
import { guessImageMimeType } from './imageMimeTypes';

export interface JpegEncoderOptions {
    /** Wider images are scaled down to this width */
    maxWidth?: number;
    quality?: number;
    /** Encoded size above which a warning is logged */
    warnBytes?: number;
}

export const DEFAULT_MAX_WIDTH = 1600;
export const DEFAULT_JPEG_QUALITY = 85;
export const DEFAULT_WARN_BYTES = 200 * 1024;

/**
 * Encodes local raster images as JPEG data URIs for inlining into post HTML.
 * Any per-image failure is logged and yields null.
 */
export class JpegDataUriEncoder implements IImageEncoder {
    private readonly maxWidth: number;
    private readonly quality: number;
    private readonly warnBytes: number;

    constructor(
        private readonly logger: ILogger,
        options: JpegEncoderOptions = {}
    ) {
        this.maxWidth = options.maxWidth ?? DEFAULT_MAX_WIDTH;
        this.quality = options.quality ?? DEFAULT_JPEG_QUALITY;
        this.warnBytes = options.warnBytes ?? DEFAULT_WARN_BYTES;
    }

    async encode(imagePath: string): Promise<string | null> {
        const name = path.basename(imagePath);
        const mime = guessImageMimeType(imagePath);
        if (!mime) {
            this.logger.warn(`Skipping non-image or unknown type: ${name}`);
            return null;
        }

        try {
            const data = await this.toJpeg(imagePath);
            if (data.length > this.warnBytes) {
                this.logger.warn(`Image ${name} is large (${data.length} bytes). This may cause API errors.`);
            }
            return `data:image/jpeg;base64,${data.toString('base64')}`;
        } catch (error) {
            this.logger.warn(`Failed to encode ${imagePath}: ${getErrorMessage(error)}`);
            return null;
        }
    }

    /**
     * Decodes, caps the width, normalizes color and re-encodes as JPEG.
     */
    private async toJpeg(imagePath: string): Promise<Buffer> {
        const image = sharp(imagePath);
        const { width, height, space, hasAlpha } = await image.metadata();
        if (!width || !height) {
            throw new Error('Unable to read image dimensions');
        }

        if (width > this.maxWidth) {
            const newHeight = Math.max(1, Math.round(height * (this.maxWidth / width)));
            image.resize({
                width: this.maxWidth,
                height: newHeight,
                fit: 'fill',
                kernel: sharp.kernel.lanczos3,
            });
            this.logger.info(
                `Resized image ${path.basename(imagePath)} from ${width}x${height} to ${this.maxWidth}x${newHeight}`
            );
        }

        // Opaque grayscale stays grayscale; everything else becomes RGB with alpha dropped
        if (space === 'b-w' && !hasAlpha) {
            image.toColourspace('b-w');
        } else {
            image.removeAlpha().toColourspace('srgb');
        }

        return image.jpeg({ quality: this.quality, optimiseCoding: true }).toBuffer();
    }
}
