/**
 * Supplies OAuth bearer tokens for Google APIs.
 */
export interface AccessTokenProvider {
    getAccessToken(): Promise<string>;
}

/**
 * Uses a token provisioned out of band (env/config). Refreshing it is the operator's job.
 */
export class StaticAccessTokenProvider implements AccessTokenProvider {
    constructor(private readonly token: string) {
        if (!token) {
            throw new Error('Google access token is required');
        }
    }

    async getAccessToken(): Promise<string> {
        return this.token;
    }
}
