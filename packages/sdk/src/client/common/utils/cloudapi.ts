/**
 * Cloud API client
 *
 * Talks to the IAM token service and the resource controller. Every call has
 * a bounded timeout and honours an AbortSignal; failures are mapped onto the
 * SDK error taxonomy by response class.
 */

import axios, { AxiosError, AxiosResponse, Method } from "axios";

import {
  IAM_TIMEOUT_MS,
  LOOKUP_TIMEOUT_MS,
  PROVISION_TIMEOUT_MS,
} from "../constants";
import {
  AuthError,
  CancelledError,
  DeploymentError,
  RequestRejectedError,
  TransientError,
} from "../errors";
import { CloudEnvironmentConfig } from "../types";

const IAM_APIKEY_GRANT_TYPE = "urn:ibm:params:oauth:grant-type:apikey";

export interface IamToken {
  accessToken: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

export interface ResourceGroup {
  id: string;
  name: string;
  default: boolean;
}

export interface ResourceInstanceRequest {
  name: string;
  /** Deployment location, e.g. dal13 */
  target: string;
  resourceGroupId: string;
  resourcePlanId: string;
  parameters: Record<string, string>;
}

export interface ResourceInstance {
  id: string;
  guid?: string;
  name?: string;
  state?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export class CloudApiClient {
  private readonly iamUrl: string;
  private readonly resourceControllerUrl: string;
  private readonly clientId?: string;

  constructor(options: { environmentConfig: CloudEnvironmentConfig; clientId?: string }) {
    this.iamUrl = options.environmentConfig.iamUrl.replace(/\/+$/, "");
    this.resourceControllerUrl = options.environmentConfig.resourceControllerUrl.replace(/\/+$/, "");
    this.clientId = options.clientId;
  }

  /**
   * Exchange an API key for a bearer token
   */
  async requestToken(apiKey: string, options: RequestOptions = {}): Promise<IamToken> {
    const body = new URLSearchParams({ grant_type: IAM_APIKEY_GRANT_TYPE, apikey: apiKey });
    const data = await this.request(
      "IAM token exchange",
      {
        url: `${this.iamUrl}/identity/token`,
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        data: body.toString(),
        timeout: IAM_TIMEOUT_MS,
      },
      options,
      true,
    );

    const accessToken = readString(data, "access_token");
    if (!accessToken) {
      throw new AuthError("IAM token exchange returned no access token");
    }
    const expiration = readNumber(data, "expiration");
    const expiresIn = readNumber(data, "expires_in");
    const expiresAt =
      expiration !== undefined
        ? expiration * 1000
        : Date.now() + (expiresIn !== undefined ? expiresIn * 1000 : 0);

    return { accessToken, expiresAt };
  }

  /**
   * Look up the account that owns an API key
   */
  async getAccountId(
    apiKey: string,
    accessToken: string,
    options: RequestOptions = {},
  ): Promise<string> {
    const data = await this.request(
      "Account lookup",
      {
        url: `${this.iamUrl}/v1/apikeys/details`,
        method: "GET",
        headers: { Authorization: `Bearer ${accessToken}`, "IAM-Apikey": apiKey },
        timeout: LOOKUP_TIMEOUT_MS,
      },
      options,
    );
    const accountId = readString(data, "account_id");
    if (!accountId) {
      throw new RequestRejectedError("Account lookup returned no account id");
    }
    return accountId;
  }

  async listResourceGroups(
    accountId: string,
    accessToken: string,
    options: RequestOptions = {},
  ): Promise<ResourceGroup[]> {
    const data = await this.request(
      "Resource group lookup",
      {
        url: `${this.resourceControllerUrl}/v2/resource_groups?${new URLSearchParams({ account_id: accountId })}`,
        method: "GET",
        headers: { Authorization: `Bearer ${accessToken}` },
        timeout: LOOKUP_TIMEOUT_MS,
      },
      options,
    );

    const resources = isRecord(data) && Array.isArray(data.resources) ? data.resources : [];
    return resources.flatMap((group: unknown): ResourceGroup[] => {
      const id = readString(group, "id");
      if (!id) return [];
      return [
        {
          id,
          name: readString(group, "name") ?? id,
          default: isRecord(group) && group.default === true,
        },
      ];
    });
  }

  async createResourceInstance(
    request: ResourceInstanceRequest,
    accessToken: string,
    options: RequestOptions = {},
  ): Promise<ResourceInstance> {
    const data = await this.request(
      "Provisioning request",
      {
        url: `${this.resourceControllerUrl}/v2/resource_instances`,
        method: "POST",
        headers: { Authorization: `Bearer ${accessToken}`, "Content-Type": "application/json" },
        data: {
          name: request.name,
          target: request.target,
          resource_group: request.resourceGroupId,
          resource_plan_id: request.resourcePlanId,
          parameters: request.parameters,
        },
        timeout: PROVISION_TIMEOUT_MS,
      },
      options,
    );
    return toResourceInstance(data, "Provisioning request");
  }

  async getResourceInstance(
    instanceId: string,
    accessToken: string,
    options: RequestOptions = {},
  ): Promise<ResourceInstance> {
    const data = await this.request(
      "Instance lookup",
      {
        url: `${this.resourceControllerUrl}/v2/resource_instances/${encodeURIComponent(instanceId)}`,
        method: "GET",
        headers: { Authorization: `Bearer ${accessToken}` },
        timeout: LOOKUP_TIMEOUT_MS,
      },
      options,
    );
    return toResourceInstance(data, "Instance lookup");
  }

  private async request(
    what: string,
    config: {
      url: string;
      method: Method;
      headers: Record<string, string>;
      data?: unknown;
      timeout: number;
    },
    options: RequestOptions,
    clientErrorIsAuth = false,
  ): Promise<unknown> {
    if (options.signal?.aborted) {
      throw new CancelledError(`${what} cancelled`);
    }

    const headers: Record<string, string> = { Accept: "application/json", ...config.headers };
    if (this.clientId) headers["x-client-id"] = this.clientId;

    let res: AxiosResponse<unknown>;
    try {
      res = await axios.request<unknown>({
        url: config.url,
        method: config.method,
        headers,
        data: config.data,
        timeout: config.timeout,
        signal: options.signal,
        maxRedirects: 0,
        validateStatus: () => true,
      });
    } catch (error: unknown) {
      throw networkError(what, config.url, error);
    }

    if (res.status < 200 || res.status >= 300) {
      throw httpError(what, res, clientErrorIsAuth);
    }
    return res.data;
  }
}

function httpError(what: string, res: AxiosResponse<unknown>, clientErrorIsAuth: boolean): DeploymentError {
  const status = res.status;
  const body = typeof res.data === "string" ? res.data : res.data ? JSON.stringify(res.data) : "";
  const message = `${what} failed: ${status} - ${truncate(body) || "Unknown error"}`;

  if (status >= 500 || status === 408 || status === 429) {
    return new TransientError(message);
  }
  if (clientErrorIsAuth || status === 401 || status === 403) {
    return new AuthError(message);
  }
  return new RequestRejectedError(message, status);
}

function networkError(what: string, url: string, error: unknown): DeploymentError {
  if (axios.isCancel(error)) {
    return new CancelledError(`${what} cancelled`);
  }
  if (error instanceof AxiosError) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return new TransientError(`${what} timed out (${url})`, { cause: error });
    }
    return new TransientError(`Failed to connect to ${url}: ${error.message}`, { cause: error });
  }
  return new TransientError(`${what} failed: ${String(error)}`, { cause: error });
}

function toResourceInstance(data: unknown, what: string): ResourceInstance {
  const id = readString(data, "id") ?? readString(data, "guid");
  if (!id) {
    throw new RequestRejectedError(`${what} returned no instance id`);
  }
  return {
    id,
    guid: readString(data, "guid"),
    name: readString(data, "name"),
    state: readString(data, "state"),
  };
}

function truncate(body: string): string {
  return body.length > 500 ? `${body.substring(0, 500)}...` : body;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(data: unknown, key: string): string | undefined {
  if (!isRecord(data)) return undefined;
  const value = data[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

function readNumber(data: unknown, key: string): number | undefined {
  if (!isRecord(data)) return undefined;
  const value = data[key];
  return typeof value === "number" ? value : undefined;
}
