/**
 * Interactive prompts for CLI commands
 *
 * The configuration wizard lives here. It only produces configuration
 * values; the SDK never prompts.
 */

import * as path from "path";
import { input, select, password, confirm as inquirerConfirm } from "@inquirer/prompts";
import {
  DEFAULT_CLOUD_ENVIRONMENT,
  DEFAULT_IMAGE_TAG,
  DEFAULT_INSTANCE_NAME,
  DEFAULT_LOCATION,
  DEFAULT_REGISTRATION_FILE,
  DEFAULT_REGISTRY_URL,
  DEFAULT_TRUST_SERVER,
  getAvailableEnvironments,
  validateImageTag,
  validateInstanceName,
  validateReadableFile,
  validateRegistryUrl,
  type DeploymentConfigFile,
} from "@hpvs-deploy/sdk";

/** Everything the wizard asks for */
export interface WizardAnswers {
  registryUrl: string;
  namespace: string;
  username: string;
  password: string;
  imageTag: string;
  trustServer: string;
  rootPassphrase: string;
  repositoryPassphrase: string;
  delegation?: {
    keyName: string;
    publicKeyFile: string;
    privateKeyFile: string;
    passphrase: string;
  };
  vendorKey: {
    name: string;
    publicKeyFile: string;
    privateKeyFile: string;
    passphrase: string;
  };
  environment: string;
  apiKey: string;
  location: string;
  resourceGroup: string;
  instanceName: string;
  registrationFile: string;
}

// Inquirer validators return true or a message
const asPromptValidator =
  (validate: (value: string) => string | undefined) =>
  (value: string): string | true =>
    validate(value.trim()) ?? true;

const requiredValue =
  (what: string) =>
  (value: string): string | true =>
    value.trim() ? true : `${what} is required`;

// ==================== Wizard ====================

/**
 * Turn wizard answers into the YAML file layout. Empty optional answers are
 * left out so the resolver applies (and logs) its defaults.
 *
 * File answers are relative to the working directory, the loader resolves
 * them against the config file's directory: they are rewritten relative to
 * `configPath`.
 */
export function buildConfigFile(answers: WizardAnswers, configPath: string): DeploymentConfigFile {
  const optional = (value: string): string | undefined => (value.trim() ? value.trim() : undefined);
  const configDir = path.dirname(path.resolve(configPath));
  const fromConfigDir = (file: string): string =>
    path.isAbsolute(file) ? file : path.relative(configDir, path.resolve(file));

  return {
    image: { tag: answers.imageTag },
    registry: {
      url: answers.registryUrl,
      namespace: answers.namespace,
      username: answers.username,
      password: answers.password,
    },
    trust: {
      server: answers.trustServer,
      rootPassphrase: answers.rootPassphrase,
      // Same as the root passphrase unless the user chose a different one
      repositoryPassphrase:
        answers.repositoryPassphrase && answers.repositoryPassphrase !== answers.rootPassphrase
          ? answers.repositoryPassphrase
          : undefined,
      delegation: answers.delegation
        ? {
            ...answers.delegation,
            publicKeyFile: fromConfigDir(answers.delegation.publicKeyFile),
            privateKeyFile: fromConfigDir(answers.delegation.privateKeyFile),
          }
        : undefined,
    },
    vendorKey: {
      ...answers.vendorKey,
      publicKeyFile: fromConfigDir(answers.vendorKey.publicKeyFile),
      privateKeyFile: fromConfigDir(answers.vendorKey.privateKeyFile),
    },
    cloud: {
      environment: answers.environment,
      apiKey: answers.apiKey && answers.apiKey !== answers.password ? answers.apiKey : undefined,
      location: answers.location,
      resourceGroup: optional(answers.resourceGroup),
      instanceName: answers.instanceName,
    },
    registrationFile: fromConfigDir(answers.registrationFile),
  };
}

/**
 * Ask for every deployment setting of the file that will be written to `configPath`
 */
export async function promptDeploymentConfig(configPath: string): Promise<DeploymentConfigFile> {
  // Registry
  const registryUrl = (
    await input({
      message: "Container registry:",
      default: DEFAULT_REGISTRY_URL,
      validate: asPromptValidator(validateRegistryUrl),
    })
  ).trim();
  const namespace = (
    await input({ message: "Registry namespace:", validate: requiredValue("Namespace") })
  ).trim();
  const username = (
    await input({ message: "Registry user name:", validate: requiredValue("User name") })
  ).trim();
  const registryPassword = await password({
    message: "Registry password or access token:",
    mask: true,
    validate: requiredValue("Password"),
  });
  const imageTag = (
    await input({
      message: "Image tag:",
      default: DEFAULT_IMAGE_TAG,
      validate: asPromptValidator(validateImageTag),
    })
  ).trim();

  // Content trust
  const trustServer = (
    await input({ message: "Content trust server:", default: DEFAULT_TRUST_SERVER })
  ).trim();
  const rootPassphrase = await password({
    message: "Root key passphrase:",
    mask: true,
    validate: requiredValue("Root key passphrase"),
  });
  const repositoryPassphrase = await password({
    message: "Repository key passphrase (leave empty to use the root passphrase):",
    mask: true,
  });

  let delegation: WizardAnswers["delegation"];
  if (await confirmWithDefault("Sign with a delegation key?", false)) {
    delegation = {
      keyName: (
        await input({ message: "Delegation key name:", validate: requiredValue("Key name") })
      ).trim(),
      publicKeyFile: await promptKeyFile("Delegation public key file:"),
      privateKeyFile: await promptKeyFile("Delegation private key file:"),
      passphrase: await password({
        message: "Delegation key passphrase:",
        mask: true,
        validate: requiredValue("Passphrase"),
      }),
    };
  }

  // Vendor key
  const vendorKey = {
    name: (
      await input({ message: "Vendor key name:", validate: requiredValue("Key name") })
    ).trim(),
    publicKeyFile: await promptKeyFile("Vendor public key file:"),
    privateKeyFile: await promptKeyFile("Vendor private key file:"),
    passphrase: await password({
      message: "Vendor key passphrase:",
      mask: true,
      validate: requiredValue("Passphrase"),
    }),
  };

  // Cloud
  const environment = await getEnvironmentInteractive();
  const apiKey = await password({
    message: "Cloud API key (leave empty to use the registry password):",
    mask: true,
  });
  const location = (await input({ message: "Location:", default: DEFAULT_LOCATION })).trim();
  const resourceGroup = await input({
    message: "Resource group ID (leave empty for the account's default group):",
  });
  const instanceName = (
    await input({
      message: "Instance name:",
      default: DEFAULT_INSTANCE_NAME,
      validate: asPromptValidator(validateInstanceName),
    })
  ).trim();
  const registrationFile = (
    await input({ message: "Registration file:", default: DEFAULT_REGISTRATION_FILE })
  ).trim();

  return buildConfigFile(
    {
      registryUrl,
      namespace,
      username,
      password: registryPassword,
      imageTag,
      trustServer,
      rootPassphrase,
      repositoryPassphrase,
      delegation,
      vendorKey,
      environment,
      apiKey,
      location,
      resourceGroup,
      instanceName,
      registrationFile,
    },
    configPath,
  );
}

async function promptKeyFile(message: string): Promise<string> {
  return (
    await input({
      message,
      validate: asPromptValidator(validateReadableFile),
    })
  ).trim();
}

// ==================== Environment Selection ====================

/**
 * Prompt for the cloud environment
 */
export async function getEnvironmentInteractive(): Promise<string> {
  const availableEnvs = getAvailableEnvironments();
  if (availableEnvs.length === 1) {
    return availableEnvs[0];
  }

  return select({
    message: "Select cloud environment:",
    choices: availableEnvs.map((env) => ({ name: env, value: env })),
    default: availableEnvs.includes(DEFAULT_CLOUD_ENVIRONMENT) ? DEFAULT_CLOUD_ENVIRONMENT : undefined,
  });
}

// ==================== Confirmation ====================

/**
 * ConfirmWithDefault prompts the user to confirm an action with a yes/no question and a default value.
 */
export async function confirmWithDefault(
  prompt: string,
  defaultValue: boolean = false,
): Promise<boolean> {
  return await inquirerConfirm({
    message: prompt,
    default: defaultValue,
  });
}
