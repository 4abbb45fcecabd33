import { BloggerPost, POST_STATUSES, titlesMatch } from '../../domain/entities/BloggerPost';
import { getErrorMessage } from '../../domain/errors/PublishErrors';
import { IBloggerClient, PostListRequest } from '../../domain/ports/IBloggerClient';
import { ILogger } from '../../domain/ports/ILogger';

/**
 * Finds an existing post by title across the DRAFT, SCHEDULED and LIVE listings.
 */
export class PostLocator {
    constructor(private readonly logger: ILogger) { }

    /**
     * Returns the first post whose trimmed, case-insensitive title matches, or null.
     * Listing failures are logged and rethrown.
     */
    async findPostByTitle(client: IBloggerClient, blogId: string, title: string): Promise<BloggerPost | null> {
        try {
            let scanned = 0;
            for await (const post of this.iteratePosts(client, blogId)) {
                scanned++;
                if (titlesMatch(post.title, title)) {
                    this.logger.info(`Found: ${title} (ID:${post.id}, Status:${post.status || 'UNKNOWN'})`);
                    return post;
                }
            }
            this.logger.debug(`No post titled '${title}' among ${scanned} posts`);
            return null;
        } catch (error) {
            this.logger.error(`Search failed: ${getErrorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Yields every post, one status at a time, following page cursors.
     */
    async *iteratePosts(client: IBloggerClient, blogId: string): AsyncGenerator<BloggerPost> {
        for (const status of POST_STATUSES) {
            let request: PostListRequest | null = { blogId, statuses: [status] };

            while (request) {
                const response = await client.postsList(request);
                yield* response.items ?? [];
                request = client.postsListNext(request, response);
            }
        }
    }
}
