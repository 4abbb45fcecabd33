/**
 * Base class for errors raised while publishing.
 */
export class PublishError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PublishError';
    }
}

/**
 * The refresh token could not be exchanged for an access token.
 */
export class TokenRefreshError extends PublishError {
    constructor(message: string) {
        super(message);
        this.name = 'TokenRefreshError';
    }
}

/**
 * A list, insert or update call against the blog API failed.
 */
export class BloggerApiError extends PublishError {
    constructor(
        message: string,
        public readonly statusCode?: number
    ) {
        super(message);
        this.name = 'BloggerApiError';
    }
}

export class SourceFileNotFoundError extends PublishError {
    constructor(public readonly filePath: string) {
        super(`Source file not found: ${filePath}`);
        this.name = 'SourceFileNotFoundError';
    }
}

export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
