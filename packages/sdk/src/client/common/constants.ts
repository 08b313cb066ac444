/**
 * Constants used throughout the SDK
 */

import { Platform, SourceMode } from "./types";

// Image naming
export const TARGET_ARCHITECTURE = "s390x";
export const REMOTE_IMAGE_NAMESPACE = "ibmcom";
export const LOCAL_IMAGE_NAMESPACE = "local";

export function repositoryForPlatform(platform: Platform): string {
  return `fhe-toolkit-${platform}-${TARGET_ARCHITECTURE}`;
}

export function sourceImageFor(platform: Platform, mode: SourceMode): string {
  const namespace = mode === "local-build" ? LOCAL_IMAGE_NAMESPACE : REMOTE_IMAGE_NAMESPACE;
  return `${namespace}/${repositoryForPlatform(platform)}`;
}

// Config defaults
export const DEFAULT_CONFIG_FILE = "hpvs-deploy.yaml";
export const DEFAULT_PLATFORM: Platform = "fedora";
export const DEFAULT_SOURCE_MODE: SourceMode = "remote-registry";
export const DEFAULT_IMAGE_TAG = "latest";
export const DEFAULT_REGISTRY_URL = "docker.io";
export const DEFAULT_TRUST_SERVER = "https://notary.docker.io";
export const DEFAULT_CLOUD_ENVIRONMENT = "production";
export const DEFAULT_LOCATION = "dal13";
export const DEFAULT_RESOURCE_PLAN_ID = "bb0005a1-ec13-4ee4-86f4-0c3b15a357d5";
export const DEFAULT_INSTANCE_NAME = "fhetoolkit-s390x-sample";
export const DEFAULT_REGISTRATION_FILE = "hpvs-fhe-registration.txt";

// Timeouts per call class (milliseconds)
export const DOCKER_TRANSFER_TIMEOUT_MS = 30 * 60 * 1000;
export const DOCKER_SESSION_TIMEOUT_MS = 60 * 1000;
export const DOCKER_TRUST_TIMEOUT_MS = 2 * 60 * 1000;
export const IAM_TIMEOUT_MS = 30 * 1000;
export const LOOKUP_TIMEOUT_MS = 30 * 1000;
export const PROVISION_TIMEOUT_MS = 60 * 1000;

// Refresh the IAM token when it is this close to expiry
export const TOKEN_REFRESH_MARGIN_MS = 60 * 1000;

// Instance watcher backoff
export const WATCH_INITIAL_DELAY_MS = 5 * 1000;
export const WATCH_MAX_DELAY_MS = 60 * 1000;
export const WATCH_BACKOFF_FACTOR = 2;
export const WATCH_MAX_ATTEMPTS = 10;

export const CLIENT_ID = "hpvs-deploy/0.1.0";
