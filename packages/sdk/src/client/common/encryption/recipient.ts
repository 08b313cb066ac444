/**
 * Registration recipient key source
 *
 * The key registrations are encrypted for is published by the hosting service
 * at a fixed URL per environment. It is never taken from user input. Fetching
 * it over TLS is not proof of authenticity: compare the logged fingerprint
 * with the one the service publishes, or pin it in the configuration.
 */

import axios, { AxiosResponse } from "axios";

import { LOOKUP_TIMEOUT_MS } from "../constants";
import { CancelledError } from "../errors";
import { CloudEnvironmentConfig } from "../types";

export function createRecipientKeyFetcher(
  environmentConfig: CloudEnvironmentConfig,
  options: { signal?: AbortSignal; clientId?: string } = {},
): () => Promise<string> {
  return async () => {
    const url = environmentConfig.registrationKeyUrl;
    let res: AxiosResponse;
    try {
      res = await axios.get(url, {
        headers: options.clientId ? { "x-client-id": options.clientId } : undefined,
        responseType: "text",
        timeout: LOOKUP_TIMEOUT_MS,
        signal: options.signal,
        validateStatus: () => true,
      });
    } catch (err) {
      if (axios.isCancel(err)) {
        throw new CancelledError("Registration recipient key fetch was cancelled");
      }
      throw err;
    }
    if (res.status < 200 || res.status >= 300) {
      throw new Error(`GET ${url} returned ${res.status}`);
    }
    const body = typeof res.data === "string" ? res.data : String(res.data);
    if (!body.includes("-----BEGIN")) {
      throw new Error(`${url} did not return a PEM encoded key`);
    }
    return body;
  };
}
