/**
 * OAuth client settings used to refresh an access token.
 */
export interface OAuthCredentials {
    clientId: string;
    clientSecret: string;
    refreshToken: string;
    tokenEndpoint?: string;
    scopes?: string[];
}

/**
 * Supplies a valid bearer token, refreshing it when needed.
 */
export interface IAccessTokenProvider {
    getAccessToken(): Promise<string>;
}
