/**
 * Core types for the HPVS deployment SDK
 */

export const PLATFORMS = ["alpine", "fedora", "ubuntu"] as const;
export type Platform = (typeof PLATFORMS)[number];

export const SOURCE_MODES = ["remote-registry", "local-build"] as const;
export type SourceMode = (typeof SOURCE_MODES)[number];

export type DeploymentStage = "config" | "trust" | "registration" | "provision" | "watch";

export interface RegistryCredentials {
  username: string;
  password: string;
}

export interface RegistryConfig extends RegistryCredentials {
  /** Registry host, e.g. docker.io */
  url: string;
  namespace: string;
}

/** Delegation key pair used to sign instead of the repository key */
export interface TrustDelegation {
  keyName: string;
  publicKeyFile: string;
  privateKeyFile: string;
  passphrase: string;
}

export interface TrustConfig {
  /** Notary server holding the trust metadata */
  serverUrl: string;
  rootPassphrase: string;
  /** Passphrase of the repository key, used for root-only signing */
  repositoryPassphrase: string;
  delegation?: TrustDelegation;
}

export interface VendorKeyConfig {
  name: string;
  publicKeyFile: string;
  privateKeyFile: string;
  passphrase: string;
}

export interface CloudConfig {
  environment: string;
  apiKey: string;
  location: string;
  /** Unset means "use the account's default resource group" */
  resourceGroupId?: string;
  resourcePlanId: string;
  instanceName: string;
  /** Expected JWK thumbprint of the registration recipient key */
  registrationKeyFingerprint?: string;
}

export interface DeploymentConfig {
  readonly platform: Platform;
  readonly sourceMode: SourceMode;
  readonly image: { readonly tag: string };
  readonly registry: Readonly<RegistryConfig>;
  readonly trust: Readonly<TrustConfig>;
  readonly vendorKey: Readonly<VendorKeyConfig>;
  readonly cloud: Readonly<CloudConfig>;
  readonly registrationFile: string;
}

export interface SignedImageRef {
  registryUrl: string;
  namespace: string;
  repository: string;
  tag: string;
}

export interface RegistrationDocument {
  key: string;
  registry: string;
  namespace: string;
  repository_name: string;
  auth: RegistryCredentials;
}

export interface EncryptedRegistrationArtifact {
  /** Where the ciphertext was written */
  path: string;
  /** Compact JWE wrapping the vendor-signed compact JWS of the document */
  ciphertext: string;
  signerKeyName: string;
  recipientFingerprint: string;
}

export interface ProvisionedInstance {
  instanceId: string;
  name: string;
  location: string;
  resourceGroupId: string;
  resourcePlanId: string;
  sourceTag: string;
}

export interface CloudEnvironmentConfig {
  name: string;
  iamUrl: string;
  resourceControllerUrl: string;
  /** Well-known location of the public key registrations are encrypted for */
  registrationKeyUrl: string;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}
