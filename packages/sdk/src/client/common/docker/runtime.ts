/**
 * Container runtime used by the trust signer
 */

import Docker from "dockerode";

import {
  DOCKER_SESSION_TIMEOUT_MS,
  DOCKER_TRANSFER_TIMEOUT_MS,
  DOCKER_TRUST_TIMEOUT_MS,
  TARGET_ARCHITECTURE,
} from "../constants";
import { Logger, RegistryCredentials } from "../types";
import { runDockerCommand } from "./exec";
import { pullDockerImage, tagDockerImage } from "./inspect";

/** Content trust settings for a trust-aware docker call */
export interface TrustEnvironment {
  serverUrl: string;
  rootPassphrase: string;
  /** Passphrase of the key that signs: the delegation key or the repository key */
  signingPassphrase: string;
}

export interface RuntimeCallOptions {
  signal?: AbortSignal;
}

export interface ContainerRuntime {
  pull(imageRef: string, options?: RuntimeCallOptions): Promise<void>;
  tag(sourceRef: string, targetRepository: string, tag: string): Promise<void>;
  login(
    registryUrl: string,
    credentials: RegistryCredentials,
    options?: RuntimeCallOptions,
  ): Promise<void>;
  logout(registryUrl: string): Promise<void>;
  loadTrustKey(
    privateKeyFile: string,
    keyName: string,
    passphrase: string,
    options?: RuntimeCallOptions,
  ): Promise<void>;
  addTrustSigner(
    keyName: string,
    publicKeyFile: string,
    repository: string,
    trust: TrustEnvironment,
    options?: RuntimeCallOptions,
  ): Promise<void>;
  /** Push image layers and signed trust metadata in one step */
  pushSigned(imageRef: string, trust: TrustEnvironment, options?: RuntimeCallOptions): Promise<void>;
}

function trustEnv(trust: TrustEnvironment): Record<string, string> {
  return {
    DOCKER_CONTENT_TRUST_SERVER: trust.serverUrl,
    DOCKER_CONTENT_TRUST_ROOT_PASSPHRASE: trust.rootPassphrase,
    DOCKER_CONTENT_TRUST_REPOSITORY_PASSPHRASE: trust.signingPassphrase,
  };
}

/**
 * Docker-backed runtime: dockerode for the local image store, the docker CLI
 * for registry sessions and content trust
 */
export class DockerContainerRuntime implements ContainerRuntime {
  constructor(
    private readonly logger: Logger,
    private readonly docker: Docker = new Docker(),
  ) {}

  async pull(imageRef: string, options: RuntimeCallOptions = {}): Promise<void> {
    await pullDockerImage(
      this.docker,
      imageRef,
      {
        platform: `linux/${TARGET_ARCHITECTURE}`,
        timeoutMs: DOCKER_TRANSFER_TIMEOUT_MS,
        signal: options.signal,
      },
      this.logger,
    );
  }

  async tag(sourceRef: string, targetRepository: string, tag: string): Promise<void> {
    await tagDockerImage(this.docker, sourceRef, targetRepository, tag);
  }

  async login(
    registryUrl: string,
    credentials: RegistryCredentials,
    options: RuntimeCallOptions = {},
  ): Promise<void> {
    await runDockerCommand(
      ["login", registryUrl, "--username", credentials.username, "--password-stdin"],
      {
        input: credentials.password,
        timeoutMs: DOCKER_SESSION_TIMEOUT_MS,
        signal: options.signal,
        logger: this.logger,
      },
    );
  }

  async logout(registryUrl: string): Promise<void> {
    await runDockerCommand(["logout", registryUrl], {
      timeoutMs: DOCKER_SESSION_TIMEOUT_MS,
      logger: this.logger,
    });
  }

  async loadTrustKey(
    privateKeyFile: string,
    keyName: string,
    passphrase: string,
    options: RuntimeCallOptions = {},
  ): Promise<void> {
    await runDockerCommand(["trust", "key", "load", privateKeyFile, "--name", keyName], {
      env: { DOCKER_CONTENT_TRUST_REPOSITORY_PASSPHRASE: passphrase },
      timeoutMs: DOCKER_TRUST_TIMEOUT_MS,
      signal: options.signal,
      logger: this.logger,
    });
  }

  async addTrustSigner(
    keyName: string,
    publicKeyFile: string,
    repository: string,
    trust: TrustEnvironment,
    options: RuntimeCallOptions = {},
  ): Promise<void> {
    // Adds the key to targets/releases and to targets/<keyName>, initialising
    // the repository's trust data on the server if needed
    await runDockerCommand(["trust", "signer", "add", "--key", publicKeyFile, keyName, repository], {
      env: trustEnv(trust),
      timeoutMs: DOCKER_TRUST_TIMEOUT_MS,
      signal: options.signal,
      logger: this.logger,
    });
  }

  async pushSigned(
    imageRef: string,
    trust: TrustEnvironment,
    options: RuntimeCallOptions = {},
  ): Promise<void> {
    this.logger.info(`Pushing signed image ${imageRef}...`);
    await runDockerCommand(["push", imageRef], {
      env: { DOCKER_CONTENT_TRUST: "1", ...trustEnv(trust) },
      timeoutMs: DOCKER_TRANSFER_TIMEOUT_MS,
      signal: options.signal,
      logger: this.logger,
    });
    this.logger.info("Image push and trust metadata publish completed");
  }
}
