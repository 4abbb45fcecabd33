import axios from 'axios';
import { TokenRefreshError } from '../../domain/errors/PublishErrors';
import { IAccessTokenProvider, OAuthCredentials } from '../../domain/ports/IAccessTokenProvider';
import { describeErrorBody } from '../http/errorDetails';

export const DEFAULT_TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token';
export const BLOGGER_SCOPE = 'https://www.googleapis.com/auth/blogger';

const TOKEN_REFRESH_BUFFER = 5 * 60 * 1000; // Refresh 5 minutes before expiry

interface TokenResponse {
    access_token: string;
    expires_in: number;
    token_type?: string;
    scope?: string;
}

interface CachedToken {
    accessToken: string;
    expiresAt: number;
}

/**
 * Exchanges a long-lived refresh token for short-lived access tokens.
 * The access token is cached in memory until shortly before it expires.
 */
export class OAuthRefreshTokenProvider implements IAccessTokenProvider {
    private readonly tokenEndpoint: string;
    private readonly scopes: string[];
    private cached: CachedToken | null = null;

    constructor(
        private readonly credentials: OAuthCredentials,
        private readonly timeout: number = 30000,
        private readonly now: () => number = Date.now
    ) {
        if (!credentials.clientId.trim()) {
            throw new Error('OAuth client ID is required');
        }
        if (!credentials.clientSecret.trim()) {
            throw new Error('OAuth client secret is required');
        }
        if (!credentials.refreshToken.trim()) {
            throw new Error('OAuth refresh token is required');
        }
        this.tokenEndpoint = credentials.tokenEndpoint ?? DEFAULT_TOKEN_ENDPOINT;
        this.scopes = credentials.scopes ?? [BLOGGER_SCOPE];
    }

    async getAccessToken(): Promise<string> {
        if (this.cached && this.now() < this.cached.expiresAt - TOKEN_REFRESH_BUFFER) {
            return this.cached.accessToken;
        }

        const token = await this.refresh();
        this.cached = {
            accessToken: token.access_token,
            expiresAt: this.now() + token.expires_in * 1000,
        };
        return token.access_token;
    }

    private async refresh(): Promise<TokenResponse> {
        const form = new URLSearchParams({
            client_id: this.credentials.clientId,
            client_secret: this.credentials.clientSecret,
            refresh_token: this.credentials.refreshToken,
            grant_type: 'refresh_token',
        });
        if (this.scopes.length > 0) {
            form.set('scope', this.scopes.join(' '));
        }

        try {
            const response = await axios.post<TokenResponse>(this.tokenEndpoint, form.toString(), {
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
                timeout: this.timeout,
            });

            if (!response.data?.access_token) {
                throw new TokenRefreshError('Token refresh failed: response did not include an access token');
            }
            return response.data;
        } catch (error) {
            if (error instanceof TokenRefreshError) {
                throw error;
            }
            if (axios.isAxiosError(error) && error.response) {
                throw new TokenRefreshError(
                    `Token refresh failed (${error.response.status}): ${describeErrorBody(error.response.data)}`
                );
            }
            const message = error instanceof Error ? error.message : 'Unknown error';
            throw new TokenRefreshError(`Token refresh failed: ${message}`);
        }
    }
}
