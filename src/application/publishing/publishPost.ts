import { Config, getConfig } from '../../config';
import { BloggerPost, PublishRequest } from '../../domain/entities/BloggerPost';
import { OAuthCredentials } from '../../domain/ports/IAccessTokenProvider';
import { ILogger } from '../../domain/ports/ILogger';
import { OAuthRefreshTokenProvider } from '../../infrastructure/auth/OAuthRefreshTokenProvider';
import { BloggerApiClient } from '../../infrastructure/blogger/BloggerApiClient';
import { JpegDataUriEncoder } from '../../infrastructure/images/JpegDataUriEncoder';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { ContentTransformer } from './ContentTransformer';
import { PostLocator } from './PostLocator';
import { BloggerClientFactory, PublishOrchestrator } from './PublishOrchestrator';

export interface PublishOptions {
    config?: Config;
    logger?: ILogger;
    clientFactory?: BloggerClientFactory;
}

/**
 * Wires the REST, OAuth and image adapters into a PublishOrchestrator.
 */
export function createPublishOrchestrator(options: PublishOptions = {}): PublishOrchestrator {
    const config = options.config ?? getConfig();
    const logger: ILogger = options.logger ?? new ConsoleLogger('Publisher', config.logLevel);

    const clientFactory: BloggerClientFactory = options.clientFactory ?? ((credentials: OAuthCredentials) => {
        const tokenProvider = new OAuthRefreshTokenProvider(
            {
                ...credentials,
                tokenEndpoint: credentials.tokenEndpoint ?? config.oauthTokenUrl,
                scopes: credentials.scopes ?? [config.oauthScope],
            },
            config.httpTimeoutMs
        );
        return new BloggerApiClient(tokenProvider, {
            baseUrl: config.bloggerApiBaseUrl,
            timeout: config.httpTimeoutMs,
        });
    });

    const encoder = new JpegDataUriEncoder(logger.child('ImageEncoder'), {
        maxWidth: config.imageMaxWidth,
        quality: config.imageJpegQuality,
        warnBytes: config.imageWarnBytes,
    });

    return new PublishOrchestrator({
        clientFactory,
        transformer: new ContentTransformer(encoder, logger.child('ContentTransformer')),
        locator: new PostLocator(logger.child('PostLocator')),
        logger,
    });
}

/**
 * Publishes or updates the post titled `request.title` on the given blog.
 */
export async function publishPost(
    credentials: OAuthCredentials,
    blogId: string,
    request: PublishRequest,
    options: PublishOptions = {}
): Promise<BloggerPost> {
    return createPublishOrchestrator(options).publishPost(credentials, blogId, request);
}
