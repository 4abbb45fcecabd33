/**
 * End-to-end publish against nock-backed OAuth and Blogger endpoints.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import nock from 'nock';
import sharp from 'sharp';
import { publishPost } from '../../src/application/publishing/publishPost';
import { createPublishRequest } from '../../src/domain/entities/BloggerPost';
import { BloggerApiError, TokenRefreshError } from '../../src/domain/errors/PublishErrors';
import { ConsoleLogger } from '../../src/infrastructure/logging/ConsoleLogger';
import { createMockLogger, createTestConfig, messagesAt } from '../helpers/testDoubles';

describe('publishPost pipeline', () => {
    const TOKEN_HOST = 'https://oauth2.googleapis.com';
    const API_HOST = 'https://www.googleapis.com';
    const POSTS_PATH = '/blogger/v3/blogs/blog-1/posts';
    const credentials = {
        clientId: 'test-client',
        clientSecret: 'test-secret',
        refreshToken: 'test-refresh-token',
    };
    const config = createTestConfig();
    const logger = new ConsoleLogger('Publisher', 'error');

    let tmpDir: string;

    beforeAll(() => {
        nock.disableNetConnect();
    });

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'publish-pipeline-'));
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        nock.cleanAll();
        fs.rmSync(tmpDir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    function mockToken(): nock.Scope {
        return nock(TOKEN_HOST)
            .post('/token')
            .reply(200, { access_token: 'test-access-token', expires_in: 3600 });
    }

    function mockEmptyListings(): nock.Scope {
        return nock(API_HOST)
            .get(POSTS_PATH).query({ status: 'DRAFT' }).reply(200, {})
            .get(POSTS_PATH).query({ status: 'SCHEDULED' }).reply(200, {})
            .get(POSTS_PATH).query({ status: 'LIVE' }).reply(200, {});
    }

    it('should create a draft with local images inlined', async () => {
        await sharp({ create: { width: 20, height: 10, channels: 3, background: { r: 1, g: 2, b: 3 } } })
            .png()
            .toFile(path.join(tmpDir, 'chart.png'));
        const sourceFilePath = path.join(tmpDir, 'post.html');

        let sentContent = '';
        const token = mockToken();
        const listings = mockEmptyListings();
        const insert = nock(API_HOST)
            .post(POSTS_PATH, (body: { title: string; content: string; labels?: string[] }) => {
                sentContent = body.content;
                return body.title === 'Charts' && JSON.stringify(body.labels) === '["data"]';
            })
            .query({ isDraft: 'true' })
            .reply(200, { id: 'p-1', title: 'Charts', status: 'DRAFT', url: 'https://example.blogspot.com/charts.html' });

        const post = await publishPost(
            credentials,
            'blog-1',
            createPublishRequest({
                title: 'Charts',
                rawContent: '<p><img src="chart.png"></p>',
                labels: ['data'],
                sourceFilePath,
            }),
            { config, logger }
        );

        expect(post.id).toBe('p-1');
        expect(sentContent).toMatch(/^<p><img src="data:image\/jpeg;base64,[^"]+"><\/p>$/);
        expect(token.isDone()).toBe(true);
        expect(listings.isDone()).toBe(true);
        expect(insert.isDone()).toBe(true);
    });

    it('should follow pagination and update a matching draft', async () => {
        mockToken();
        nock(API_HOST)
            .get(POSTS_PATH).query({ status: 'DRAFT' })
            .reply(200, { items: [{ id: 'a', title: 'Other', status: 'DRAFT' }], nextPageToken: 'n2' })
            .get(POSTS_PATH).query({ status: 'DRAFT', pageToken: 'n2' })
            .reply(200, { items: [{ id: 'b', title: '  weekly notes ', status: 'DRAFT' }] });
        const update = nock(API_HOST)
            .put(`${POSTS_PATH}/b`, { title: 'Weekly Notes', content: '<p>v2</p>' })
            .reply(200, { id: 'b', title: 'Weekly Notes', status: 'DRAFT' });

        const post = await publishPost(
            credentials,
            'blog-1',
            createPublishRequest({ title: 'Weekly Notes', rawContent: '<p>v2</p>' }),
            { config, logger }
        );

        expect(post.id).toBe('b');
        expect(update.isDone()).toBe(true);
    });

    it('should return a live post without writing to it', async () => {
        mockToken();
        nock(API_HOST)
            .get(POSTS_PATH).query({ status: 'DRAFT' }).reply(200, {})
            .get(POSTS_PATH).query({ status: 'SCHEDULED' }).reply(200, {})
            .get(POSTS_PATH).query({ status: 'LIVE' })
            .reply(200, { items: [{ id: 'live-1', title: 'Launch', status: 'LIVE', url: 'https://example.blogspot.com/launch.html' }] });

        const post = await publishPost(
            credentials,
            'blog-1',
            createPublishRequest({ title: 'Launch', rawContent: '<p>edit</p>' }),
            { config, logger }
        );

        expect(post).toEqual({ id: 'live-1', title: 'Launch', status: 'LIVE', url: 'https://example.blogspot.com/launch.html' });
        expect(nock.pendingMocks()).toEqual([]);
    });

    it('should log through an injected logger and its scoped children', async () => {
        const injected = createMockLogger();
        mockToken();
        mockEmptyListings();
        nock(API_HOST)
            .post(POSTS_PATH)
            .query({ isDraft: 'true' })
            .reply(200, { id: 'p-9', title: 'Notes', status: 'DRAFT', url: 'https://example.blogspot.com/notes.html' });

        await publishPost(
            credentials,
            'blog-1',
            createPublishRequest({ title: 'Notes', rawContent: '<p>n</p>' }),
            { config, logger: injected }
        );

        expect(injected.child.mock.calls.map(call => call[0])).toEqual(['ImageEncoder', 'ContentTransformer', 'PostLocator']);
        expect(messagesAt(injected, 'info')).toContain('Successfully created post: https://example.blogspot.com/notes.html');
    });

    it('should fail with TokenRefreshError before calling the blog API', async () => {
        nock(TOKEN_HOST)
            .post('/token')
            .reply(400, { error: 'invalid_grant', error_description: 'Bad Request' });

        await expect(
            publishPost(credentials, 'blog-1', createPublishRequest({ title: 'T', rawContent: 'c' }), { config, logger })
        ).rejects.toBeInstanceOf(TokenRefreshError);
    });

    it('should propagate listing failures without retrying', async () => {
        mockToken();
        const listing = nock(API_HOST)
            .get(POSTS_PATH).query({ status: 'DRAFT' })
            .once()
            .reply(500, { error: { code: 500, message: 'Backend Error' } });

        await expect(
            publishPost(credentials, 'blog-1', createPublishRequest({ title: 'T', rawContent: 'c' }), { config, logger })
        ).rejects.toThrow(BloggerApiError);
        expect(listing.isDone()).toBe(true);
    });
});
