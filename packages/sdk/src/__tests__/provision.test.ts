import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CloudSession } from "../client/common/auth/session";
import { ConfigurationError } from "../client/common/errors";
import type { CloudConfig, EncryptedRegistrationArtifact, SignedImageRef } from "../client/common/types";
import { CloudApiClient } from "../client/common/utils/cloudapi";
import { provisionInstance } from "../client/modules/deploy/provision";
import { createRecordingLogger, FakeCloudServer, testEnvironment, tokenResponse } from "./helpers";

const CLOUD: CloudConfig = {
  environment: "production",
  apiKey: "test-api-key",
  location: "dal13",
  resourcePlanId: "bb0005a1-ec13-4ee4-86f4-0c3b15a357d5",
  instanceName: "fhetoolkit-s390x-sample",
};

const ARTIFACT: EncryptedRegistrationArtifact = {
  path: "/tmp/hpvs-fhe-registration.txt",
  ciphertext: "header.key.iv.ciphertext.tag",
  signerKeyName: "vendor",
  recipientFingerprint: "fingerprint",
};

const IMAGE: SignedImageRef = {
  registryUrl: "docker.io",
  namespace: "acme",
  repository: "fhe-toolkit-fedora-s390x",
  tag: "latest",
};

describe("provisionInstance", () => {
  let server: FakeCloudServer;
  let session: CloudSession;

  beforeEach(async () => {
    server = new FakeCloudServer()
      .route("POST /identity/token", tokenResponse())
      .route("GET /v1/apikeys/details", { status: 200, body: { account_id: "acct-1" } })
      .route("POST /v2/resource_instances", {
        status: 201,
        body: { id: "inst-1", state: "provisioning" },
      });
    const client = new CloudApiClient({ environmentConfig: testEnvironment(await server.start()) });
    session = new CloudSession(client, "test-api-key");
  });

  afterEach(async () => {
    await server.stop();
  });

  it("looks up the account and then its default group before submitting", async () => {
    server.route("GET /v2/resource_groups", {
      status: 200,
      body: {
        resources: [
          { id: "rg-other", name: "other", default: false },
          { id: "rg-default", name: "Default", default: true },
        ],
      },
    });

    const instance = await provisionInstance(
      { cloud: CLOUD, artifact: ARTIFACT, image: IMAGE },
      session,
      createRecordingLogger(),
    );

    expect(server.requestLog).toEqual([
      "POST /identity/token",
      "GET /v1/apikeys/details",
      "GET /v2/resource_groups",
      "POST /v2/resource_instances",
    ]);
    expect(instance).toEqual({
      instanceId: "inst-1",
      name: "fhetoolkit-s390x-sample",
      location: "dal13",
      resourceGroupId: "rg-default",
      resourcePlanId: "bb0005a1-ec13-4ee4-86f4-0c3b15a357d5",
      sourceTag: "latest",
    });
    expect(session.resourceGroupId).toBe("rg-default");

    const submitted = JSON.parse(server.requests[3].body);
    expect(submitted.resource_group).toBe("rg-default");
    expect(submitted.parameters).toEqual({
      registration_file: "header.key.iv.ciphertext.tag",
      image_tag: "latest",
    });
  });

  it("skips the lookups when a resource group is configured", async () => {
    const instance = await provisionInstance(
      { cloud: { ...CLOUD, resourceGroupId: "rg-configured" }, artifact: ARTIFACT, image: IMAGE },
      session,
      createRecordingLogger(),
    );

    expect(server.requestLog).toEqual(["POST /identity/token", "POST /v2/resource_instances"]);
    expect(instance.resourceGroupId).toBe("rg-configured");
  });

  it("fails with ConfigurationError when the account has no default group", async () => {
    server.route("GET /v2/resource_groups", {
      status: 200,
      body: { resources: [{ id: "rg-other", name: "other", default: false }] },
    });

    await expect(
      provisionInstance(
        { cloud: CLOUD, artifact: ARTIFACT, image: IMAGE },
        session,
        createRecordingLogger(),
      ),
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(server.requestLog).not.toContain("POST /v2/resource_instances");
  });

  it("fails with ConfigurationError when the account has no groups", async () => {
    server.route("GET /v2/resource_groups", { status: 200, body: { resources: [] } });

    await expect(
      provisionInstance(
        { cloud: CLOUD, artifact: ARTIFACT, image: IMAGE },
        session,
        createRecordingLogger(),
      ),
    ).rejects.toThrow("Unable to determine resource groups for account 'acct-1'");
  });
});
