/**
 * Shared formatting utilities for CLI display
 */

import chalk from "chalk";
import {
  ConfigurationError,
  DeploymentError,
  type DeploymentStage,
  type ProvisionedInstance,
} from "@hpvs-deploy/sdk";

const STAGE_LABELS: Record<DeploymentStage, string> = {
  config: "Configuration",
  trust: "Image signing",
  registration: "Registration",
  provision: "Provisioning",
  watch: "Instance watch",
};

export const USAGE_HINT =
  "Run 'hpvs-deploy deploy --help' for usage, or 'hpvs-deploy config create FILE' to write a configuration file";

/**
 * Single-line description of a failed run: "<stage> failed (<subject>): <message>"
 */
export function formatDeploymentError(err: unknown): string {
  if (!(err instanceof DeploymentError)) {
    return err instanceof Error ? err.message : String(err);
  }
  if (!err.stage) {
    return err.message;
  }
  const subject = err.subject ? ` (${err.subject})` : "";
  return `${STAGE_LABELS[err.stage]} failed${subject}: ${err.message}`;
}

/**
 * Configuration errors carry usage guidance
 */
export function needsUsageHint(err: unknown): boolean {
  return err instanceof ConfigurationError;
}

/**
 * Format instance status with color
 */
export function formatState(state: string): string {
  switch (state.toLowerCase()) {
    case "active":
      return chalk.green(state);
    case "provisioning":
    case "inactive":
      return chalk.cyan(state);
    case "failed":
    case "removed":
      return chalk.red(state);
    default:
      return chalk.gray(state);
  }
}

/**
 * Summary lines printed after a successful run
 */
export function formatProvisionedInstance(instance: ProvisionedInstance): string[] {
  return [
    `${chalk.bold("Instance ID:")}    ${chalk.cyan(instance.instanceId)}`,
    `${chalk.bold("Name:")}           ${instance.name}`,
    `${chalk.bold("Location:")}       ${instance.location}`,
    `${chalk.bold("Resource group:")} ${instance.resourceGroupId}`,
    `${chalk.bold("Plan:")}           ${instance.resourcePlanId}`,
    `${chalk.bold("Image tag:")}      ${instance.sourceTag}`,
  ];
}
