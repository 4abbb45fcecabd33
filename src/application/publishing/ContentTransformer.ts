import fs from 'fs';
import path from 'path';
import * as cheerio from 'cheerio';
import { IImageEncoder } from '../../domain/ports/IImageEncoder';
import { ILogger } from '../../domain/ports/ILogger';

const REMOTE_OR_INLINE_SRC = /^(https?:|data:)/i;

/**
 * Parses with htmlparser2 in HTML mode so fragments are not wrapped in
 * an invented <html>/<body>.
 */
const PARSER_OPTIONS = {
    xml: {
        xmlMode: false,
        decodeEntities: true,
        encodeEntities: 'utf8' as const,
    },
};

interface PlannedImage {
    /** Position among the document's <img> elements */
    index: number;
    filePath: string;
}

/**
 * Prepares post HTML for submission: strips <header> blocks, inlines local
 * images and reduces full documents to their styles plus body content.
 */
export class ContentTransformer {
    constructor(
        private readonly imageEncoder: IImageEncoder,
        private readonly logger: ILogger
    ) { }

    async transform(html: string, baseDir?: string): Promise<string> {
        const $ = cheerio.load(html, PARSER_OPTIONS);

        // Pass 1: drop header subtrees
        $('header').remove();

        // Pass 2: inline local images
        const planned = this.planImageRewrites($, baseDir ?? process.cwd());
        const rewrites = new Map<number, string>();
        for (const image of planned) {
            const uri = await this.imageEncoder.encode(image.filePath);
            if (uri) {
                rewrites.set(image.index, uri);
            }
        }
        const images = $('img');
        for (const [index, uri] of rewrites) {
            images.eq(index).attr('src', uri);
        }

        const body = $('body');
        if (body.length > 0) {
            const styles = $('head')
                .find('style')
                .toArray()
                .map(style => $.html(style));
            return styles.join('') + (body.first().html() ?? '');
        }

        return $.html();
    }

    /**
     * Resolves every local <img> reference that exists on disk.
     */
    private planImageRewrites($: cheerio.CheerioAPI, baseDir: string): PlannedImage[] {
        const planned: PlannedImage[] = [];

        $('img').each((index, node) => {
            const src = $(node).attr('src');
            if (!src || REMOTE_OR_INLINE_SRC.test(src)) {
                return;
            }

            const filePath = path.isAbsolute(src) ? src : path.join(baseDir, src);
            if (!fs.existsSync(filePath)) {
                this.logger.warn(`Image file not found: ${filePath}`);
                return;
            }

            planned.push({ index, filePath });
        });

        return planned;
    }
}
