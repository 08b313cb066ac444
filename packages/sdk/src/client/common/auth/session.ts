/**
 * Cloud session management
 *
 * Holds the IAM bearer token derived from the API key, plus the account and
 * resource group it resolves to. The token is short-lived; it is exchanged
 * again whenever it is about to expire. Nothing is persisted.
 */

import { TOKEN_REFRESH_MARGIN_MS } from "../constants";
import { CloudApiClient, IamToken, RequestOptions } from "../utils/cloudapi";

export interface CloudSessionInfo {
  accessToken: string;
  expiresAt: number;
  accountId?: string;
  resourceGroupId?: string;
}

export class CloudSession {
  private token?: IamToken;
  accountId?: string;
  resourceGroupId?: string;

  constructor(
    private readonly client: CloudApiClient,
    private readonly apiKey: string,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Return a bearer token valid for at least the refresh margin
   */
  async getAccessToken(options: RequestOptions = {}): Promise<string> {
    if (!this.token || this.token.expiresAt - this.now() <= TOKEN_REFRESH_MARGIN_MS) {
      this.token = await this.client.requestToken(this.apiKey, options);
    }
    return this.token.accessToken;
  }

  /**
   * Resolve (once) the account that owns the API key
   */
  async getAccountId(options: RequestOptions = {}): Promise<string> {
    if (!this.accountId) {
      const accessToken = await this.getAccessToken(options);
      this.accountId = await this.client.getAccountId(this.apiKey, accessToken, options);
    }
    return this.accountId;
  }

  info(): CloudSessionInfo | undefined {
    if (!this.token) return undefined;
    return {
      accessToken: this.token.accessToken,
      expiresAt: this.token.expiresAt,
      accountId: this.accountId,
      resourceGroupId: this.resourceGroupId,
    };
  }

  get api(): CloudApiClient {
    return this.client;
  }
}
