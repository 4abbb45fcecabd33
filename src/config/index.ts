import dotenv from 'dotenv';
import { LogLevel } from '../domain/ports/ILogger';
import { isLogLevel } from '../infrastructure/logging/ConsoleLogger';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    environment: string;
    logLevel: LogLevel;

    // Blogger API
    bloggerApiBaseUrl: string;
    httpTimeoutMs: number;

    // OAuth
    oauthTokenUrl: string;
    oauthScope: string;

    // Image inlining
    imageMaxWidth: number;
    imageJpegQuality: number;
    imageWarnBytes: number;

    // Fallbacks for CLI options
    blogId?: string;
    clientId?: string;
    clientSecret?: string;
    refreshToken?: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getOptionalEnvVar(key: string): string | undefined {
    if (process.env[key] === undefined) {
        return undefined;
    }
    const value = getEnvVar(key);
    return value || undefined;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getLogLevel(key: string, defaultValue: LogLevel): LogLevel {
    const value = getEnvVar(key, defaultValue).toLowerCase();
    if (!isLogLevel(value)) {
        throw new Error(`Environment variable ${key} must be one of debug, info, warn, error, got: ${value}`);
    }
    return value;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        environment: getEnvVar('NODE_ENV', 'development'),
        logLevel: getLogLevel('LOG_LEVEL', 'info'),

        bloggerApiBaseUrl: getEnvVar('BLOGGER_API_BASE_URL', 'https://www.googleapis.com/blogger/v3'),
        httpTimeoutMs: getEnvVarNumber('HTTP_TIMEOUT_MS', 30000),

        oauthTokenUrl: getEnvVar('OAUTH_TOKEN_URL', 'https://oauth2.googleapis.com/token'),
        oauthScope: getEnvVar('OAUTH_SCOPE', 'https://www.googleapis.com/auth/blogger'),

        imageMaxWidth: getEnvVarNumber('IMAGE_MAX_WIDTH', 1600),
        imageJpegQuality: getEnvVarNumber('IMAGE_JPEG_QUALITY', 85),
        imageWarnBytes: getEnvVarNumber('IMAGE_WARN_BYTES', 200 * 1024),

        blogId: getOptionalEnvVar('BLOGGER_BLOG_ID'),
        clientId: getOptionalEnvVar('BLOGGER_CLIENT_ID'),
        clientSecret: getOptionalEnvVar('BLOGGER_CLIENT_SECRET'),
        refreshToken: getOptionalEnvVar('BLOGGER_REFRESH_TOKEN'),
    };
}

/**
 * Checks value ranges; returns one message per problem.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.imageMaxWidth) || config.imageMaxWidth < 1) {
        errors.push('IMAGE_MAX_WIDTH must be a positive integer');
    }
    if (!Number.isInteger(config.imageJpegQuality) || config.imageJpegQuality < 1 || config.imageJpegQuality > 100) {
        errors.push('IMAGE_JPEG_QUALITY must be an integer between 1 and 100');
    }
    if (config.imageWarnBytes <= 0) {
        errors.push('IMAGE_WARN_BYTES must be greater than 0');
    }
    if (config.httpTimeoutMs <= 0) {
        errors.push('HTTP_TIMEOUT_MS must be greater than 0');
    }
    if (!config.bloggerApiBaseUrl.startsWith('https://') && !config.bloggerApiBaseUrl.startsWith('http://')) {
        errors.push('BLOGGER_API_BASE_URL must be an http(s) URL');
    }

    return errors;
}

// Singleton config instance
let configInstance: Config | null = null;

/**
 * Gets the configuration singleton.
 */
export function getConfig(): Config {
    if (!configInstance) {
        configInstance = loadConfig();
    }
    return configInstance;
}

/**
 * Resets the configuration singleton (for testing).
 */
export function resetConfig(): void {
    configInstance = null;
}
