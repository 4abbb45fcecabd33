/**
 * Turns a local image file into a data URI, or null when it cannot be used.
 */
export interface IImageEncoder {
    encode(imagePath: string): Promise<string | null>;
}
