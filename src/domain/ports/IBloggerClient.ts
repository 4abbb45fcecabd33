/**
 * IBloggerClient Port
 *
 * The narrow slice of the remote blog API used by the publisher.
 */

import { BloggerPost, PostBody, PostStatus } from '../entities/BloggerPost';

/**
 * A listing request; carries the cursor for the next page.
 */
export interface PostListRequest {
    blogId: string;
    statuses: PostStatus[];
    pageToken?: string;
}

export interface PostListResponse {
    items?: BloggerPost[];
    nextPageToken?: string;
}

export interface IBloggerClient {
    /**
     * Lists one page of posts in the given lifecycle states.
     */
    postsList(request: PostListRequest): Promise<PostListResponse>;

    /**
     * Builds the request for the page after `previousResponse`, or null when exhausted.
     */
    postsListNext(previousRequest: PostListRequest, previousResponse: PostListResponse): PostListRequest | null;

    postsInsert(blogId: string, body: PostBody, isDraft: boolean): Promise<BloggerPost>;

    postsUpdate(blogId: string, postId: string, body: PostBody): Promise<BloggerPost>;
}
