/**
 * Main SDK entry point
 */

// Export all types
export * from "./common/types";
export * from "./common/errors";

// Export validation utilities (non-interactive)
export * from "./common/utils/validation";

export {
  getEnvironmentConfig,
  getAvailableEnvironments,
  isEnvironmentAvailable,
} from "./common/config/environment";
export {
  loadDeploymentConfig,
  resolveDeploymentConfig,
  writeDeploymentConfigFile,
  assertConfigFileAbsent,
  parsePlatform,
  type DeploymentConfigFile,
  type ResolveConfigOptions,
} from "./common/config/deploymentConfig";
export * from "./common/constants";

export { defaultLogger, getLogger } from "./common/utils/logger";
export { getHostArchitecture, canBuildForTarget } from "./common/utils/host";

// Collaborators
export {
  DockerContainerRuntime,
  type ContainerRuntime,
  type RuntimeCallOptions,
  type TrustEnvironment,
} from "./common/docker/runtime";
export { DockerCommandError } from "./common/docker/exec";
export {
  FileKeyring,
  keyFingerprint,
  type Keyring,
  type KeyHandle,
  type RecipientKey,
} from "./common/encryption/keyring";
export { openEnvelope } from "./common/encryption/envelope";
export { createRecipientKeyFetcher } from "./common/encryption/recipient";
export {
  CloudApiClient,
  type IamToken,
  type ResourceGroup,
  type ResourceInstance,
  type ResourceInstanceRequest,
  type RequestOptions,
} from "./common/utils/cloudapi";
export { CloudSession, type CloudSessionInfo } from "./common/auth/session";

// Pipeline
export * from "./modules/deploy";
