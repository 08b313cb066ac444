import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CloudSession } from "../client/common/auth/session";
import { RequestRejectedError, TransientError } from "../client/common/errors";
import { CloudApiClient } from "../client/common/utils/cloudapi";
import { backoffDelay, watchInstanceUntilActive } from "../client/modules/deploy/watcher";
import {
  createRecordingLogger,
  FakeCloudServer,
  testEnvironment,
  tokenResponse,
  type StubResponse,
} from "./helpers";

describe("backoffDelay", () => {
  it("doubles from the initial delay up to the cap", () => {
    expect([0, 1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, 5000, 60000))).toEqual([
      5000, 10000, 20000, 40000, 60000, 60000,
    ]);
  });
});

describe("watchInstanceUntilActive", () => {
  let server: FakeCloudServer;
  let session: CloudSession;
  let sleeps: number[];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };

  function respondInOrder(responses: StubResponse[]): void {
    let call = 0;
    server.route("GET /v2/resource_instances/inst-1", () => {
      const response = responses[Math.min(call, responses.length - 1)];
      call++;
      return response;
    });
  }

  const state = (value: string): StubResponse => ({ status: 200, body: { id: "inst-1", state: value } });

  beforeEach(async () => {
    sleeps = [];
    server = new FakeCloudServer().route("POST /identity/token", tokenResponse());
    const client = new CloudApiClient({ environmentConfig: testEnvironment(await server.start()) });
    session = new CloudSession(client, "test-api-key");
  });

  afterEach(async () => {
    await server.stop();
  });

  it("polls with backoff until the instance is active", async () => {
    respondInOrder([state("provisioning"), state("provisioning"), state("active")]);
    const logger = createRecordingLogger();

    await expect(watchInstanceUntilActive("inst-1", session, logger, { sleep })).resolves.toBe(
      "active",
    );
    expect(sleeps).toEqual([5000, 10000]);
    expect(logger.lines.filter((l) => l.level === "info").map((l) => l.message)).toEqual([
      "Instance 'inst-1' is provisioning",
      "Instance 'inst-1' is active",
    ]);
  });

  it("stops when the instance fails", async () => {
    respondInOrder([state("provisioning"), state("failed")]);

    await expect(
      watchInstanceUntilActive("inst-1", session, createRecordingLogger(), { sleep }),
    ).rejects.toBeInstanceOf(RequestRejectedError);
    expect(sleeps).toEqual([5000]);
  });

  it("gives up after the maximum number of attempts", async () => {
    respondInOrder([state("provisioning")]);

    await expect(
      watchInstanceUntilActive("inst-1", session, createRecordingLogger(), {
        sleep,
        maxAttempts: 3,
      }),
    ).rejects.toThrow(
      "Instance 'inst-1' was not active after 3 status checks (last state: provisioning)",
    );
    expect(sleeps).toEqual([5000, 10000]);
  });

  it("counts transient poll failures as attempts", async () => {
    respondInOrder([{ status: 503, body: { message: "unavailable" } }, state("active")]);
    const logger = createRecordingLogger();

    await watchInstanceUntilActive("inst-1", session, logger, { sleep });

    expect(sleeps).toEqual([5000]);
    expect(logger.lines.some((l) => l.level === "warn")).toBe(true);
  });

  it("surfaces exhaustion as a transient error", async () => {
    respondInOrder([{ status: 503, body: { message: "unavailable" } }]);

    await expect(
      watchInstanceUntilActive("inst-1", session, createRecordingLogger(), {
        sleep,
        maxAttempts: 2,
      }),
    ).rejects.toBeInstanceOf(TransientError);
  });
});
