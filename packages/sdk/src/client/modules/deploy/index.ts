/**
 * Deployment pipeline
 *
 * Runs trust & push, registration and provisioning strictly in order and
 * stops at the first failure. The registry session is closed afterwards
 * whenever a login was attempted, whatever the outcome.
 */

import * as fs from "fs";

import { CloudSession } from "../../common/auth/session";
import { getEnvironmentConfig } from "../../common/config/environment";
import { CLIENT_ID, repositoryForPlatform } from "../../common/constants";
import { ContainerRuntime, DockerContainerRuntime } from "../../common/docker/runtime";
import { FileKeyring, Keyring } from "../../common/encryption/keyring";
import { createRecipientKeyFetcher } from "../../common/encryption/recipient";
import {
  assertNotCancelled,
  CancelledError,
  DeploymentError,
  errorMessage,
} from "../../common/errors";
import {
  DeploymentConfig,
  DeploymentStage,
  EncryptedRegistrationArtifact,
  Logger,
  ProvisionedInstance,
} from "../../common/types";
import { CloudApiClient } from "../../common/utils/cloudapi";
import { defaultLogger } from "../../common/utils/logger";
import { provisionInstance } from "./provision";
import { buildAndSealRegistration } from "./registration";
import { establishTrust, RegistrySession } from "./trust";

export interface DeploymentDependencies {
  runtime: ContainerRuntime;
  keyring: Keyring;
  session: CloudSession;
  logger?: Logger;
  signal?: AbortSignal;
  /** Defaults to the running host's architecture */
  hostArch?: string;
}

/**
 * Build the default collaborators for a configuration
 */
export function createDeploymentDependencies(
  config: DeploymentConfig,
  options: { logger?: Logger; signal?: AbortSignal; clientId?: string } = {},
): DeploymentDependencies {
  const logger = options.logger ?? defaultLogger;
  const clientId = options.clientId ?? CLIENT_ID;
  const environmentConfig = getEnvironmentConfig(config.cloud.environment);

  return {
    runtime: new DockerContainerRuntime(logger),
    keyring: new FileKeyring(
      createRecipientKeyFetcher(environmentConfig, { signal: options.signal, clientId }),
    ),
    session: new CloudSession(new CloudApiClient({ environmentConfig, clientId }), config.cloud.apiKey),
    logger,
    signal: options.signal,
  };
}

/**
 * Deploy the toolkit image and provision an instance from it
 */
export async function runDeployment(
  config: DeploymentConfig,
  deps: DeploymentDependencies,
): Promise<ProvisionedInstance> {
  const { runtime, keyring, session, signal } = deps;
  const logger = deps.logger ?? defaultLogger;
  const registrySession: RegistrySession = { loginAttempted: false };
  const repository = repositoryForPlatform(config.platform);

  let stage: DeploymentStage = "trust";
  let subject = `${config.registry.url}/${config.registry.namespace}/${repository}:${config.image.tag}`;
  let artifact: EncryptedRegistrationArtifact | undefined;

  try {
    // 1. Trust & push
    logger.info(`Deploying '${subject}' (${config.sourceMode})`);
    const image = await establishTrust(config, runtime, logger, {
      signal,
      hostArch: deps.hostArch,
      session: registrySession,
    });

    // 2. Registration
    assertNotCancelled(signal, "registration");
    stage = "registration";
    subject = config.registrationFile;
    artifact = await buildAndSealRegistration(
      {
        registrationFilePath: config.registrationFile,
        vendorPublicKeyFile: config.vendorKey.publicKeyFile,
        vendorPrivateKeyFile: config.vendorKey.privateKeyFile,
        vendorKeyName: config.vendorKey.name,
        vendorKeyPassphrase: config.vendorKey.passphrase,
        registryCredentials: {
          username: config.registry.username,
          password: config.registry.password,
        },
        namespace: config.registry.namespace,
        repository,
        registryUrl: config.registry.url,
        expectedRecipientFingerprint: config.cloud.registrationKeyFingerprint,
        signal,
      },
      keyring,
      logger,
    );

    // 3. Provisioning
    assertNotCancelled(signal, "provisioning");
    stage = "provision";
    subject = config.cloud.instanceName;
    return await provisionInstance({ cloud: config.cloud, artifact, image, signal }, session, logger);
  } catch (err) {
    if (err instanceof CancelledError && artifact) {
      await discardArtifact(artifact, logger);
    }
    const error =
      err instanceof DeploymentError
        ? err
        : new DeploymentError(errorMessage(err), { cause: err });
    throw error.withContext(stage, subject);
  } finally {
    if (registrySession.loginAttempted) {
      await closeRegistrySession(runtime, config.registry.url, logger);
    }
  }
}

async function closeRegistrySession(
  runtime: ContainerRuntime,
  registryUrl: string,
  logger: Logger,
): Promise<void> {
  try {
    await runtime.logout(registryUrl);
    logger.info(`Logged out of registry '${registryUrl}'`);
  } catch (err) {
    logger.warn(`Failed to log out of registry '${registryUrl}': ${errorMessage(err)}`);
  }
}

async function discardArtifact(artifact: EncryptedRegistrationArtifact, logger: Logger): Promise<void> {
  try {
    await fs.promises.rm(artifact.path, { force: true });
    logger.debug(`Removed registration file '${artifact.path}'`);
  } catch (err) {
    logger.warn(`Failed to remove registration file '${artifact.path}': ${errorMessage(err)}`);
  }
}

export { watchInstanceUntilActive, backoffDelay, type WatchInstanceOptions } from "./watcher";
export {
  establishTrust,
  formatImageReference,
  resolveSourceImage,
  type EstablishTrustOptions,
  type RegistrySession,
} from "./trust";
export {
  buildAndSealRegistration,
  buildRegistrationDocument,
  type BuildAndSealOptions,
} from "./registration";
export { provisionInstance, resolveDefaultResourceGroup, type ProvisionRequest } from "./provision";
