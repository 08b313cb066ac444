/**
 * Cloud provisioner
 *
 * Submits the sealed registration to the resource controller. A returned
 * instance id means the request was accepted, not that the instance is
 * running; see watcher.ts for readiness.
 */

import { CloudSession } from "../../common/auth/session";
import { assertNotCancelled, ConfigurationError } from "../../common/errors";
import {
  CloudConfig,
  EncryptedRegistrationArtifact,
  Logger,
  ProvisionedInstance,
  SignedImageRef,
} from "../../common/types";

export interface ProvisionRequest {
  cloud: CloudConfig;
  artifact: EncryptedRegistrationArtifact;
  image: SignedImageRef;
  signal?: AbortSignal;
}

/**
 * Resolve the account's default resource group
 */
export async function resolveDefaultResourceGroup(
  session: CloudSession,
  logger: Logger,
  signal?: AbortSignal,
): Promise<string> {
  const accountId = await session.getAccountId({ signal });
  logger.debug(`Determined that account ID is '${accountId}'`);

  const accessToken = await session.getAccessToken({ signal });
  const groups = await session.api.listResourceGroups(accountId, accessToken, { signal });
  const defaultGroup = groups.find((group) => group.default);
  if (!defaultGroup) {
    throw new ConfigurationError(
      groups.length === 0
        ? `Unable to determine resource groups for account '${accountId}'`
        : `Account '${accountId}' has no default resource group; set 'cloud.resourceGroup'`,
    );
  }

  logger.info(`Default resource group for account '${accountId}' is '${defaultGroup.id}'`);
  return defaultGroup.id;
}

/**
 * Submit the provisioning request
 */
export async function provisionInstance(
  request: ProvisionRequest,
  session: CloudSession,
  logger: Logger,
): Promise<ProvisionedInstance> {
  const { cloud, artifact, image, signal } = request;

  // 1. Bearer token
  logger.info("Determining IAM token for the cloud account");
  await session.getAccessToken({ signal });

  // 2. Resource group
  let resourceGroupId = cloud.resourceGroupId;
  if (!resourceGroupId) {
    logger.info("No resource group configured, using the default group for this account");
    resourceGroupId = await resolveDefaultResourceGroup(session, logger, signal);
  }
  session.resourceGroupId = resourceGroupId;

  // 3. Submit; the token is refreshed if the previous steps took long
  assertNotCancelled(signal, "provisioning request");
  logger.info(`Provisioning instance '${cloud.instanceName}' in '${cloud.location}'`);
  const accessToken = await session.getAccessToken({ signal });
  const instance = await session.api.createResourceInstance(
    {
      name: cloud.instanceName,
      target: cloud.location,
      resourceGroupId,
      resourcePlanId: cloud.resourcePlanId,
      parameters: {
        registration_file: artifact.ciphertext,
        image_tag: image.tag,
      },
    },
    accessToken,
    { signal },
  );

  logger.info(`Provisioning request for service instance '${instance.id}' was accepted`);
  return {
    instanceId: instance.id,
    name: cloud.instanceName,
    location: cloud.location,
    resourceGroupId,
    resourcePlanId: cloud.resourcePlanId,
    sourceTag: image.tag,
  };
}
