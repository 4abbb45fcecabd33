/**
 * BloggerApiClient
 *
 * REST adapter for the Blogger v3 posts resource.
 * Every call fetches a bearer token first, so a failed refresh surfaces
 * before any request reaches the blog API.
 */

import axios from 'axios';
import { BloggerPost, PostBody } from '../../domain/entities/BloggerPost';
import { BloggerApiError } from '../../domain/errors/PublishErrors';
import { IAccessTokenProvider } from '../../domain/ports/IAccessTokenProvider';
import { IBloggerClient, PostListRequest, PostListResponse } from '../../domain/ports/IBloggerClient';
import { describeErrorBody } from '../http/errorDetails';

export const DEFAULT_BLOGGER_API_BASE_URL = 'https://www.googleapis.com/blogger/v3';

export interface BloggerApiClientOptions {
    baseUrl?: string;
    timeout?: number;
}

export class BloggerApiClient implements IBloggerClient {
    private readonly baseUrl: string;
    private readonly timeout: number;

    constructor(
        private readonly tokenProvider: IAccessTokenProvider,
        options: BloggerApiClientOptions = {}
    ) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_BLOGGER_API_BASE_URL).replace(/\/+$/, '');
        this.timeout = options.timeout ?? 30000;
    }

    async postsList(request: PostListRequest): Promise<PostListResponse> {
        const params = new URLSearchParams();
        for (const status of request.statuses) {
            params.append('status', status);
        }
        if (request.pageToken) {
            params.set('pageToken', request.pageToken);
        }

        return this.send<PostListResponse>('list posts', {
            method: 'GET',
            url: `${this.postsUrl(request.blogId)}?${params.toString()}`,
        });
    }

    postsListNext(previousRequest: PostListRequest, previousResponse: PostListResponse): PostListRequest | null {
        if (!previousResponse.nextPageToken) {
            return null;
        }
        return { ...previousRequest, pageToken: previousResponse.nextPageToken };
    }

    async postsInsert(blogId: string, body: PostBody, isDraft: boolean): Promise<BloggerPost> {
        return this.send<BloggerPost>('insert post', {
            method: 'POST',
            url: `${this.postsUrl(blogId)}?isDraft=${isDraft}`,
            data: body,
        });
    }

    async postsUpdate(blogId: string, postId: string, body: PostBody): Promise<BloggerPost> {
        return this.send<BloggerPost>('update post', {
            method: 'PUT',
            url: `${this.postsUrl(blogId)}/${encodeURIComponent(postId)}`,
            data: body,
        });
    }

    private postsUrl(blogId: string): string {
        return `${this.baseUrl}/blogs/${encodeURIComponent(blogId)}/posts`;
    }

    private async send<T>(
        operation: string,
        request: { method: 'GET' | 'POST' | 'PUT'; url: string; data?: PostBody }
    ): Promise<T> {
        const accessToken = await this.tokenProvider.getAccessToken();

        try {
            const response = await axios.request<T>({
                ...request,
                headers: {
                    'Authorization': `Bearer ${accessToken}`,
                    'Accept': 'application/json',
                    ...(request.data ? { 'Content-Type': 'application/json' } : {}),
                },
                timeout: this.timeout,
            });
            return response.data;
        } catch (error) {
            if (axios.isAxiosError(error) && error.response) {
                throw new BloggerApiError(
                    `Blogger API ${operation} failed (${error.response.status}): ${describeErrorBody(error.response.data)}`,
                    error.response.status
                );
            }
            const message = error instanceof Error ? error.message : 'Unknown error';
            throw new BloggerApiError(`Blogger API ${operation} failed: ${message}`);
        }
    }
}
