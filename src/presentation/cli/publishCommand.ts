import fs from 'fs';
import path from 'path';
import { Command, CommanderError } from 'commander';
import { Config, getConfig, validateConfig } from '../../config';
import { BloggerPost, PublishRequest, createPublishRequest, parseLabels } from '../../domain/entities/BloggerPost';
import { SourceFileNotFoundError, getErrorMessage } from '../../domain/errors/PublishErrors';
import { OAuthCredentials } from '../../domain/ports/IAccessTokenProvider';
import { ILogger } from '../../domain/ports/ILogger';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { publishPost } from '../../application/publishing/publishPost';

type CliOptions = {
    title: string;
    sourceFile: string;
    blogId: string;
    clientId: string;
    clientSecret: string;
    refreshToken: string;
    labels: string;
    publish: boolean;
};

export type PublishFn = (
    credentials: OAuthCredentials,
    blogId: string,
    request: PublishRequest
) => Promise<BloggerPost>;

export interface CliDeps {
    config?: Config;
    logger?: ILogger;
    publish?: PublishFn;
    writeOut?: (text: string) => void;
    writeErr?: (text: string) => void;
}

export function readPackageVersion(): string {
    try {
        const raw = fs.readFileSync(path.resolve(__dirname, '../../../package.json'), 'utf-8');
        const parsed: unknown = JSON.parse(raw);
        const version: unknown = parsed && typeof parsed === 'object' ? Reflect.get(parsed, 'version') : undefined;
        return typeof version === 'string' ? version : '0.0.0';
    } catch {
        return '0.0.0';
    }
}

/**
 * Declares the command line. Credentials and blog ID fall back to the environment.
 */
export function buildProgram(config: Config, deps: Pick<CliDeps, 'writeOut' | 'writeErr'> = {}): Command {
    const program = new Command();

    program
        .name('blog-publish')
        .description('Publish content to Blogspot.')
        .version(readPackageVersion())
        .requiredOption('--title <title>', 'Post title')
        .requiredOption('--source-file <path>', 'Source HTML file')
        .requiredOption('--blog-id <id>', 'Blogger Blog ID', config.blogId)
        .requiredOption('--client-id <id>', 'OAuth Client ID', config.clientId)
        .requiredOption('--client-secret <secret>', 'OAuth Client Secret', config.clientSecret)
        .requiredOption('--refresh-token <token>', 'OAuth Refresh Token', config.refreshToken)
        .option('--labels <labels>', 'Comma-separated labels', '')
        .option('--publish', 'Create new posts as live instead of draft', false)
        .exitOverride();

    if (deps.writeOut || deps.writeErr) {
        program.configureOutput({
            writeOut: deps.writeOut ?? (text => process.stdout.write(text)),
            writeErr: deps.writeErr ?? (text => process.stderr.write(text)),
        });
    }

    return program;
}

/**
 * Runs the publish command and resolves with the process exit code.
 */
export async function runPublishCommand(argv: string[], deps: CliDeps = {}): Promise<number> {
    let config: Config;
    try {
        config = deps.config ?? getConfig();
    } catch (error) {
        console.error(`[CLI] Invalid configuration: ${getErrorMessage(error)}`);
        return 1;
    }

    const logger = deps.logger ?? new ConsoleLogger('CLI', config.logLevel);
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        configErrors.forEach(message => logger.error(`Configuration: ${message}`));
        return 1;
    }

    const program = buildProgram(config, deps);
    try {
        program.parse(argv, { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        throw error;
    }

    const options = program.opts<CliOptions>();
    const sourcePath = path.resolve(options.sourceFile);

    try {
        if (!fs.existsSync(sourcePath)) {
            throw new SourceFileNotFoundError(options.sourceFile);
        }

        const request = createPublishRequest({
            title: options.title,
            rawContent: fs.readFileSync(sourcePath, 'utf-8'),
            labels: parseLabels(options.labels),
            sourceFilePath: sourcePath,
            isDraft: !options.publish,
        });
        const credentials: OAuthCredentials = {
            clientId: options.clientId,
            clientSecret: options.clientSecret,
            refreshToken: options.refreshToken,
        };

        const publish: PublishFn = deps.publish ?? ((creds, blogId, req) => publishPost(creds, blogId, req, { config }));
        const post = await publish(credentials, options.blogId, request);

        logger.info(`Done: ${post.title ?? options.title} [${post.status ?? 'UNKNOWN'}] ${post.url ?? ''}`.trimEnd());
        return 0;
    } catch (error) {
        if (error instanceof SourceFileNotFoundError) {
            logger.error(error.message);
        } else {
            logger.error(`Failed to publish post: ${getErrorMessage(error)}`);
        }
        return 1;
    }
}
