/**
 * Cloud environment configuration
 */

import { CloudEnvironmentConfig } from "../types";
import { ConfigurationError } from "../errors";

const ENVIRONMENTS: Record<string, CloudEnvironmentConfig> = {
  production: {
    name: "production",
    iamUrl: "https://iam.cloud.ibm.com",
    resourceControllerUrl: "https://resource-controller.cloud.ibm.com",
    registrationKeyUrl:
      "https://cloud.ibm.com/media/docs/downloads/hyper-protect-virtual-servers/hpvs-registration-public-key.pem",
  },
  staging: {
    name: "staging",
    iamUrl: "https://iam.test.cloud.ibm.com",
    resourceControllerUrl: "https://resource-controller.test.cloud.ibm.com",
    registrationKeyUrl:
      "https://test.cloud.ibm.com/media/docs/downloads/hyper-protect-virtual-servers/hpvs-registration-public-key.pem",
  },
};

/**
 * Get environment configuration
 */
export function getEnvironmentConfig(environment: string): CloudEnvironmentConfig {
  const env = isEnvironmentAvailable(environment) ? ENVIRONMENTS[environment] : undefined;
  if (!env) {
    throw new ConfigurationError(
      `Unknown cloud environment: ${environment} (expected one of ${getAvailableEnvironments().join(", ")})`,
    );
  }
  return { ...env };
}

export function getAvailableEnvironments(): string[] {
  return Object.keys(ENVIRONMENTS);
}

export function isEnvironmentAvailable(environment: string): boolean {
  return Object.hasOwn(ENVIRONMENTS, environment);
}
