/**
 * Instance watcher
 *
 * Polls a provisioned instance until it is active, with bounded exponential
 * backoff. Separate from the pipeline: runDeployment never waits for
 * readiness.
 */

import { CloudSession } from "../../common/auth/session";
import {
  WATCH_BACKOFF_FACTOR,
  WATCH_INITIAL_DELAY_MS,
  WATCH_MAX_ATTEMPTS,
  WATCH_MAX_DELAY_MS,
} from "../../common/constants";
import {
  CancelledError,
  errorMessage,
  RequestRejectedError,
  TransientError,
} from "../../common/errors";
import { Logger } from "../../common/types";

const INSTANCE_STATE_ACTIVE = "active";
const INSTANCE_FAILED_STATES = new Set(["failed", "removed"]);

export interface WatchInstanceOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  /** Injected in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function backoffDelay(attempt: number, initialDelayMs: number, maxDelayMs: number): number {
  return Math.min(initialDelayMs * WATCH_BACKOFF_FACTOR ** attempt, maxDelayMs);
}

/**
 * Watch an instance until it reaches the active state
 */
export async function watchInstanceUntilActive(
  instanceId: string,
  session: CloudSession,
  logger: Logger,
  options: WatchInstanceOptions = {},
): Promise<string> {
  const maxAttempts = options.maxAttempts ?? WATCH_MAX_ATTEMPTS;
  const initialDelayMs = options.initialDelayMs ?? WATCH_INITIAL_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? WATCH_MAX_DELAY_MS;
  const wait = options.sleep ?? sleep;
  const { signal } = options;

  let lastState = "unknown";
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      const accessToken = await session.getAccessToken({ signal });
      const instance = await session.api.getResourceInstance(instanceId, accessToken, { signal });
      const state = instance.state ?? "unknown";

      if (state !== lastState) {
        logger.info(`Instance '${instanceId}' is ${state}`);
        lastState = state;
      }
      if (state === INSTANCE_STATE_ACTIVE) {
        return state;
      }
      if (INSTANCE_FAILED_STATES.has(state)) {
        throw new RequestRejectedError(`Instance '${instanceId}' entered ${state} state`);
      }
    } catch (error: unknown) {
      if (!(error instanceof TransientError)) {
        throw error;
      }
      logger.warn(`Failed to fetch instance status: ${errorMessage(error)}`);
    }

    if (attempt < maxAttempts - 1) {
      await wait(backoffDelay(attempt, initialDelayMs, maxDelayMs), signal);
    }
  }

  throw new TransientError(
    `Instance '${instanceId}' was not active after ${maxAttempts} status checks (last state: ${lastState})`,
  );
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError("Instance watch cancelled"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError("Instance watch cancelled"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
