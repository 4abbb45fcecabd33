import path from 'path';
import { BloggerPost, PublishRequest, buildPostBody, isDraftStatus } from '../../domain/entities/BloggerPost';
import { getErrorMessage } from '../../domain/errors/PublishErrors';
import { OAuthCredentials } from '../../domain/ports/IAccessTokenProvider';
import { IBloggerClient } from '../../domain/ports/IBloggerClient';
import { ILogger } from '../../domain/ports/ILogger';
import { ContentTransformer } from './ContentTransformer';
import { PostLocator } from './PostLocator';

/**
 * Builds an authenticated API client for one publish call.
 */
export type BloggerClientFactory = (credentials: OAuthCredentials) => IBloggerClient;

export interface PublishOrchestratorDeps {
    clientFactory: BloggerClientFactory;
    transformer: ContentTransformer;
    locator: PostLocator;
    logger: ILogger;
}

/**
 * Creates or updates a post by title.
 *
 * transform → locate → one of:
 *  - no match: insert a new post (draft unless requested otherwise)
 *  - draft match: update it in place
 *  - scheduled/live match: leave it alone and return it unchanged
 */
export class PublishOrchestrator {
    private readonly clientFactory: BloggerClientFactory;
    private readonly transformer: ContentTransformer;
    private readonly locator: PostLocator;
    private readonly logger: ILogger;

    constructor(deps: PublishOrchestratorDeps) {
        this.clientFactory = deps.clientFactory;
        this.transformer = deps.transformer;
        this.locator = deps.locator;
        this.logger = deps.logger;
    }

    async publishPost(credentials: OAuthCredentials, blogId: string, request: PublishRequest): Promise<BloggerPost> {
        const content = await this.transformer.transform(request.rawContent, resolveBaseDir(request));
        this.logger.debug(`Processed content size: ${Buffer.byteLength(content, 'utf8')} bytes`);

        const client = this.clientFactory(credentials);
        const existing = await this.locator.findPostByTitle(client, blogId, request.title);
        const body = buildPostBody(request.title, content, request.labels);

        if (!existing) {
            this.logger.info(request.isDraft ? 'Creating new draft...' : 'Creating new post...');
            const created = await this.execute('create', () => client.postsInsert(blogId, body, request.isDraft));
            this.logger.info(`Successfully created post: ${created.url ?? created.id}`);
            return created;
        }

        if (!isDraftStatus(existing.status)) {
            this.logger.warn(`Post '${request.title}' is ${existing.status}. Skipping.`);
            return existing;
        }

        this.logger.info(`Updating existing draft: ${existing.id}`);
        const updated = await this.execute('update', () => client.postsUpdate(blogId, existing.id, body));
        this.logger.info(`Successfully updated post: ${updated.url ?? updated.id}`);
        return updated;
    }

    /**
     * Runs a single API call; failures are logged with the operation name and rethrown.
     */
    private async execute<T>(operation: string, call: () => Promise<T>): Promise<T> {
        try {
            return await call();
        } catch (error) {
            this.logger.error(`Failed to ${operation}: ${getErrorMessage(error)}`);
            throw error;
        }
    }
}

function resolveBaseDir(request: PublishRequest): string | undefined {
    if (request.sourceBasePath) {
        return request.sourceBasePath;
    }
    return request.sourceFilePath ? path.dirname(request.sourceFilePath) : undefined;
}
