/**
 * Trust signer
 *
 * Tags the toolkit image for the target repository, logs in to the registry,
 * sets up Docker Content Trust (optionally through a delegation key) and
 * pushes the signed image. All-or-nothing: a SignedImageRef is only returned
 * once the signed push has completed.
 */

import { repositoryForPlatform, sourceImageFor, TARGET_ARCHITECTURE } from "../../common/constants";
import { ContainerRuntime, TrustEnvironment } from "../../common/docker/runtime";
import { DockerCommandError, isPermissionError } from "../../common/docker/exec";
import {
  assertNotCancelled,
  AuthError,
  BuildError,
  ConfigurationError,
  CryptoError,
  DeploymentError,
  errorMessage,
} from "../../common/errors";
import { DeploymentConfig, Logger, SignedImageRef } from "../../common/types";
import { canBuildForTarget, getHostArchitecture } from "../../common/utils/host";
import { validateReadableFile } from "../../common/utils/validation";

/** Tracks whether a registry session may exist and needs a logout */
export interface RegistrySession {
  loginAttempted: boolean;
}

export interface EstablishTrustOptions {
  signal?: AbortSignal;
  /** Defaults to the running host's architecture */
  hostArch?: string;
  session?: RegistrySession;
}

export function formatImageReference(ref: SignedImageRef): string {
  return `${targetRepository(ref)}:${ref.tag}`;
}

function targetRepository(ref: Omit<SignedImageRef, "tag">): string {
  return `${ref.registryUrl}/${ref.namespace}/${ref.repository}`;
}

/**
 * Resolve the local image to deploy from platform and source mode
 */
export function resolveSourceImage(
  config: Pick<DeploymentConfig, "platform" | "sourceMode">,
  hostArch: string = getHostArchitecture(),
): string {
  if (config.sourceMode === "local-build" && !canBuildForTarget(hostArch)) {
    throw new ConfigurationError(
      `Images built on ${hostArch} hosts do not run on the hosting service, which only runs ${TARGET_ARCHITECTURE} images. ` +
        `Deploy the pre-built ${TARGET_ARCHITECTURE} image instead of a locally built one.`,
    );
  }
  return sourceImageFor(config.platform, config.sourceMode);
}

/**
 * Sign and push the toolkit image
 */
export async function establishTrust(
  config: DeploymentConfig,
  runtime: ContainerRuntime,
  logger: Logger,
  options: EstablishTrustOptions = {},
): Promise<SignedImageRef> {
  const { signal } = options;
  const session = options.session ?? { loginAttempted: false };

  // 1. Resolve the source image; fails before any runtime call on a bad host
  const sourceImage = resolveSourceImage(config, options.hostArch);

  const ref: SignedImageRef = {
    registryUrl: config.registry.url,
    namespace: config.registry.namespace,
    repository: repositoryForPlatform(config.platform),
    tag: config.image.tag,
  };
  const repository = targetRepository(ref);
  const imageRef = formatImageReference(ref);

  if (config.sourceMode === "remote-registry") {
    assertNotCancelled(signal, "image pull");
    try {
      await runtime.pull(sourceImage, { signal });
    } catch (err) {
      throw classify(err, `Failed to pull image '${sourceImage}'`, BuildError);
    }
  }

  // 2. Tag the image for the target repository
  assertNotCancelled(signal, "image tag");
  logger.info(`Tag the image '${sourceImage}' with '${imageRef}'`);
  try {
    await runtime.tag(sourceImage, repository, ref.tag);
  } catch (err) {
    throw classify(err, `Failed to tag the image '${sourceImage}'`, BuildError);
  }

  // 3. Authenticate to the registry
  assertNotCancelled(signal, "registry login");
  session.loginAttempted = true;
  try {
    await runtime.login(
      config.registry.url,
      { username: config.registry.username, password: config.registry.password },
      { signal },
    );
  } catch (err) {
    throw classify(err, `Failed to log in to registry '${config.registry.url}'`, AuthError);
  }
  logger.info(`Logged in to registry '${config.registry.url}'`);

  // 4. Set up the delegation, or fall back to root-only signing
  const trust: TrustEnvironment = {
    serverUrl: config.trust.serverUrl,
    rootPassphrase: config.trust.rootPassphrase,
    signingPassphrase: config.trust.repositoryPassphrase,
  };

  const delegation = config.trust.delegation;
  if (delegation) {
    const unreadable = validateReadableFile(delegation.privateKeyFile);
    if (unreadable) {
      throw new CryptoError(`Cannot load delegation key '${delegation.keyName}': ${unreadable}`);
    }

    assertNotCancelled(signal, "trust key load");
    try {
      await runtime.loadTrustKey(
        delegation.privateKeyFile,
        delegation.keyName,
        delegation.passphrase,
        { signal },
      );
    } catch (err) {
      throw classify(err, `Failed to load delegation key '${delegation.keyName}'`, CryptoError);
    }

    assertNotCancelled(signal, "trust delegation setup");
    try {
      await runtime.addTrustSigner(delegation.keyName, delegation.publicKeyFile, repository, trust, {
        signal,
      });
    } catch (err) {
      throw classify(
        err,
        `Failed to add signer '${delegation.keyName}' to '${repository}'`,
        CryptoError,
        true,
      );
    }

    trust.signingPassphrase = delegation.passphrase;
    logger.info(`Delegation key '${delegation.keyName}' will be used to sign '${repository}'`);
  } else {
    logger.info(
      `No delegation key configured; '${repository}' will be signed with its repository key (root-only trust)`,
    );
  }

  // 5. Sign and push image layers and trust metadata
  assertNotCancelled(signal, "signed push");
  try {
    await runtime.pushSigned(imageRef, trust, { signal });
  } catch (err) {
    throw classify(err, `Failed to sign and push '${imageRef}'`, CryptoError, true);
  }

  logger.info(`Signed and pushed '${imageRef}'`);
  return ref;
}

/**
 * Map a runtime failure onto the error taxonomy. Timeouts and cancellation
 * are already typed and pass through unchanged.
 */
function classify(
  err: unknown,
  context: string,
  ErrorType: new (message: string, options?: { cause?: unknown }) => DeploymentError,
  permissionIsAuth = false,
): DeploymentError {
  if (err instanceof DeploymentError) {
    return err;
  }
  const message = `${context}: ${errorMessage(err)}`;
  if (permissionIsAuth && err instanceof DockerCommandError && isPermissionError(err.output)) {
    return new AuthError(message, { cause: err });
  }
  return new ErrorType(message, { cause: err });
}
