/**
 * Deployment configuration resolution
 *
 * Reads the YAML deployment file, validates it and applies every default
 * explicitly. The result is a frozen DeploymentConfig that the pipeline
 * treats as the only source of settings.
 *
 * File layout:
 *
 *   image:        { tag }
 *   registry:     { url, namespace, username, password }
 *   trust:        { server, rootPassphrase, repositoryPassphrase,
 *                   delegation: { keyName, publicKeyFile, privateKeyFile, passphrase } }
 *   vendorKey:    { name, publicKeyFile, privateKeyFile, passphrase }
 *   cloud:        { environment, apiKey, location, resourceGroup, resourcePlanId,
 *                   instanceName, registrationKeyFingerprint }
 *   registrationFile: path
 */

import * as fs from "fs";
import * as path from "path";
import { load as loadYaml, dump as dumpYaml } from "js-yaml";

import {
  DEFAULT_CLOUD_ENVIRONMENT,
  DEFAULT_IMAGE_TAG,
  DEFAULT_INSTANCE_NAME,
  DEFAULT_LOCATION,
  DEFAULT_PLATFORM,
  DEFAULT_REGISTRATION_FILE,
  DEFAULT_REGISTRY_URL,
  DEFAULT_RESOURCE_PLAN_ID,
  DEFAULT_SOURCE_MODE,
  DEFAULT_TRUST_SERVER,
} from "../constants";
import { ConfigurationError, errorMessage } from "../errors";
import {
  CloudConfig,
  DeploymentConfig,
  Logger,
  PLATFORMS,
  Platform,
  SourceMode,
  TrustDelegation,
} from "../types";
import { validateImageTag, validateInstanceName, validateRegistryUrl } from "../utils/validation";
import { isEnvironmentAvailable } from "./environment";

/** Shape of the YAML file as written by users and the wizard */
export interface DeploymentConfigFile {
  image?: { tag?: string };
  registry?: { url?: string; namespace?: string; username?: string; password?: string };
  trust?: {
    server?: string;
    rootPassphrase?: string;
    repositoryPassphrase?: string;
    delegation?: {
      keyName?: string;
      publicKeyFile?: string;
      privateKeyFile?: string;
      passphrase?: string;
    };
  };
  vendorKey?: { name?: string; publicKeyFile?: string; privateKeyFile?: string; passphrase?: string };
  cloud?: {
    environment?: string;
    apiKey?: string;
    location?: string;
    resourceGroup?: string;
    resourcePlanId?: string;
    instanceName?: string;
    registrationKeyFingerprint?: string;
  };
  registrationFile?: string;
}

export interface ResolveConfigOptions {
  platform?: string;
  sourceMode?: SourceMode;
  /** Directory relative file paths are resolved against */
  baseDir?: string;
  logger?: Logger;
}

/**
 * Parse a platform name, case-insensitively
 */
export function parsePlatform(value: string | undefined): Platform {
  if (value === undefined || value === "") {
    return DEFAULT_PLATFORM;
  }
  const normalized = value.toLowerCase();
  const platform = PLATFORMS.find((p) => p === normalized);
  if (!platform) {
    throw new ConfigurationError(
      `Invalid value: '${value}' - Please specify a supported platform (${PLATFORMS.join(", ")})`,
    );
  }
  return platform;
}

/**
 * Load and resolve a deployment config file
 */
export function loadDeploymentConfig(
  configPath: string,
  options: Omit<ResolveConfigOptions, "baseDir"> = {},
): DeploymentConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(`Configuration file '${configPath}' does not exist`);
  }

  let parsed: unknown;
  try {
    parsed = loadYaml(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(
      `Failed to parse configuration file '${configPath}': ${errorMessage(err)}`,
      { cause: err },
    );
  }

  return resolveDeploymentConfig(toConfigFile(parsed, configPath), {
    ...options,
    baseDir: path.dirname(path.resolve(configPath)),
  });
}

/**
 * Build a DeploymentConfig from already-parsed file content
 */
export function resolveDeploymentConfig(
  file: DeploymentConfigFile,
  options: ResolveConfigOptions = {},
): DeploymentConfig {
  const logger = options.logger;
  const baseDir = options.baseDir ?? process.cwd();
  const resolvePath = (p: string) => path.resolve(baseDir, p);

  const platform = parsePlatform(options.platform);
  const sourceMode = options.sourceMode ?? DEFAULT_SOURCE_MODE;

  const withDefault = (key: string, value: string | undefined, fallback: string): string => {
    if (isSet(value)) return value;
    logger?.debug(`The '${key}' configuration value was not set, defaulting to '${fallback}'`);
    return fallback;
  };

  const registryUrl = withDefault("registry.url", file.registry?.url, DEFAULT_REGISTRY_URL);
  const registryUrlError = validateRegistryUrl(registryUrl);
  if (registryUrlError) {
    throw new ConfigurationError(registryUrlError);
  }

  const imageTag = withDefault("image.tag", file.image?.tag, DEFAULT_IMAGE_TAG);
  const imageTagError = validateImageTag(imageTag);
  if (imageTagError) {
    throw new ConfigurationError(imageTagError);
  }

  const registryPassword = required("registry.password", file.registry?.password);
  const rootPassphrase = required("trust.rootPassphrase", file.trust?.rootPassphrase);

  const repositoryPassphrase = file.trust?.repositoryPassphrase;
  const cloud = resolveCloudConfig(file, registryPassword, withDefault, logger);

  const config: DeploymentConfig = {
    platform,
    sourceMode,
    image: { tag: imageTag },
    registry: {
      url: registryUrl,
      namespace: required("registry.namespace", file.registry?.namespace),
      username: required("registry.username", file.registry?.username),
      password: registryPassword,
    },
    trust: {
      serverUrl: withDefault("trust.server", file.trust?.server, DEFAULT_TRUST_SERVER),
      rootPassphrase,
      repositoryPassphrase: isSet(repositoryPassphrase) ? repositoryPassphrase : rootPassphrase,
      delegation: resolveDelegation(file.trust?.delegation, resolvePath),
    },
    vendorKey: {
      name: required("vendorKey.name", file.vendorKey?.name),
      publicKeyFile: resolvePath(required("vendorKey.publicKeyFile", file.vendorKey?.publicKeyFile)),
      privateKeyFile: resolvePath(
        required("vendorKey.privateKeyFile", file.vendorKey?.privateKeyFile),
      ),
      passphrase: required("vendorKey.passphrase", file.vendorKey?.passphrase),
    },
    cloud,
    registrationFile: resolvePath(
      withDefault("registrationFile", file.registrationFile, DEFAULT_REGISTRATION_FILE),
    ),
  };

  return deepFreeze(config);
}

function resolveCloudConfig(
  file: DeploymentConfigFile,
  registryPassword: string,
  withDefault: (key: string, value: string | undefined, fallback: string) => string,
  logger?: Logger,
): CloudConfig {
  const environment = withDefault(
    "cloud.environment",
    file.cloud?.environment,
    DEFAULT_CLOUD_ENVIRONMENT,
  );
  if (!isEnvironmentAvailable(environment)) {
    throw new ConfigurationError(`Unknown cloud environment: ${environment}`);
  }

  let apiKey = file.cloud?.apiKey;
  if (!isSet(apiKey)) {
    logger?.debug("The 'cloud.apiKey' configuration value was not set; using the registry password");
    apiKey = registryPassword;
  }

  const instanceName = withDefault(
    "cloud.instanceName",
    file.cloud?.instanceName,
    DEFAULT_INSTANCE_NAME,
  );
  const instanceNameError = validateInstanceName(instanceName);
  if (instanceNameError) {
    throw new ConfigurationError(instanceNameError);
  }

  const resourceGroup = file.cloud?.resourceGroup;
  const resourceGroupId = isSet(resourceGroup) ? resourceGroup : undefined;
  if (!resourceGroupId) {
    logger?.debug(
      "The 'cloud.resourceGroup' configuration value was not set, the account's default group will be used",
    );
  }

  const fingerprint = file.cloud?.registrationKeyFingerprint;

  return {
    environment,
    apiKey,
    location: withDefault("cloud.location", file.cloud?.location, DEFAULT_LOCATION),
    resourceGroupId,
    resourcePlanId: withDefault(
      "cloud.resourcePlanId",
      file.cloud?.resourcePlanId,
      DEFAULT_RESOURCE_PLAN_ID,
    ),
    instanceName,
    registrationKeyFingerprint: isSet(fingerprint) ? fingerprint : undefined,
  };
}

function resolveDelegation(
  delegation: NonNullable<DeploymentConfigFile["trust"]>["delegation"],
  resolvePath: (p: string) => string,
): TrustDelegation | undefined {
  if (!delegation || !isSet(delegation.keyName)) {
    return undefined;
  }
  return {
    keyName: delegation.keyName,
    publicKeyFile: resolvePath(required("trust.delegation.publicKeyFile", delegation.publicKeyFile)),
    privateKeyFile: resolvePath(
      required("trust.delegation.privateKeyFile", delegation.privateKeyFile),
    ),
    passphrase: required("trust.delegation.passphrase", delegation.passphrase),
  };
}

/**
 * Throw if a config file would replace an existing file
 */
export function assertConfigFileAbsent(configPath: string): void {
  if (fs.existsSync(configPath)) {
    throw new ConfigurationError(`A file named '${configPath}' already exists`);
  }
}

/**
 * Write a new config file; refuses to replace an existing one
 */
export function writeDeploymentConfigFile(configPath: string, file: DeploymentConfigFile): void {
  assertConfigFileAbsent(configPath);
  fs.mkdirSync(path.dirname(path.resolve(configPath)), { recursive: true });
  // Contains credentials; undefined values are left out
  fs.writeFileSync(configPath, dumpYaml(file, { lineWidth: -1, skipInvalid: true }), { mode: 0o600 });
}

function toConfigFile(parsed: unknown, configPath: string): DeploymentConfigFile {
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Configuration file '${configPath}' must contain a YAML mapping`);
  }
  const doc: Record<string, unknown> = parsed;

  const section = (key: string): Record<string, string> | undefined => {
    const value = doc[key];
    if (value === undefined || value === null) return undefined;
    if (!isRecord(value)) {
      throw new ConfigurationError(`'${key}' in '${configPath}' must be a mapping`);
    }
    return stringEntries(value, key, configPath);
  };

  const trustRaw = doc["trust"];
  let delegation: Record<string, string> | undefined;
  if (isRecord(trustRaw) && trustRaw["delegation"] !== undefined && trustRaw["delegation"] !== null) {
    const d = trustRaw["delegation"];
    if (!isRecord(d)) {
      throw new ConfigurationError(`'trust.delegation' in '${configPath}' must be a mapping`);
    }
    delegation = stringEntries(d, "trust.delegation", configPath);
  }

  const trustSection = isRecord(trustRaw)
    ? stringEntries(
        Object.fromEntries(Object.entries(trustRaw).filter(([k]) => k !== "delegation")),
        "trust",
        configPath,
      )
    : section("trust");

  const registrationFile = doc["registrationFile"];
  if (registrationFile !== undefined && typeof registrationFile !== "string") {
    throw new ConfigurationError(`'registrationFile' in '${configPath}' must be a string`);
  }

  return {
    image: section("image"),
    registry: section("registry"),
    trust: trustSection ? { ...trustSection, delegation } : undefined,
    vendorKey: section("vendorKey"),
    cloud: section("cloud"),
    registrationFile,
  };
}

function stringEntries(
  value: Record<string, unknown>,
  key: string,
  configPath: string,
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (v === undefined || v === null) continue;
    if (typeof v === "string") {
      out[k] = v;
    } else if (typeof v === "number" || typeof v === "boolean") {
      // YAML turns bare tags like 1.2 and passphrases like 1234 into numbers
      out[k] = String(v);
    } else {
      throw new ConfigurationError(`'${key}.${k}' in '${configPath}' must be a string`);
    }
  }
  return out;
}

function required(key: string, value: string | undefined): string {
  if (!isSet(value)) {
    throw new ConfigurationError(`The '${key}' configuration value is required`);
  }
  return value;
}

function isSet(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}
