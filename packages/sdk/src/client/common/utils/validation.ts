/**
 * Non-interactive validation utilities for SDK
 *
 * Validators return an error message string when the value is invalid and
 * undefined when it is fine, so the CLI wizard can reuse them as prompt
 * validators.
 */

import fs from "fs";

// ==================== Registry Validation ====================

/**
 * Validate a registry host (optionally with port), without scheme or path
 */
export function validateRegistryUrl(value: string): string | undefined {
  if (!value) {
    return "Registry URL cannot be empty";
  }
  if (/^https?:\/\//i.test(value)) {
    return `Registry URL '${value}' must not include a scheme`;
  }
  if (value.includes("/")) {
    return `Registry URL '${value}' must be a host name without a path`;
  }
  if (!/^[A-Za-z0-9.-]+(:\d+)?$/.test(value)) {
    return `Registry URL '${value}' is not a valid host name`;
  }
  return undefined;
}

/**
 * Validate an image tag the way the registry does
 */
export function validateImageTag(value: string): string | undefined {
  if (!/^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/.test(value)) {
    return `Image tag '${value}' is invalid`;
  }
  return undefined;
}

// ==================== Cloud Validation ====================

/**
 * Validate the hosted instance name
 */
export function validateInstanceName(name: string): string | undefined {
  if (!name) {
    return "Instance name cannot be empty";
  }
  if (name.includes(" ")) {
    return "Instance name cannot contain spaces";
  }
  if (name.length > 63) {
    return "Instance name cannot be longer than 63 characters";
  }
  return undefined;
}

// ==================== File Validation ====================

/**
 * Validate that a file exists and is readable
 */
export function validateReadableFile(filePath: string): string | undefined {
  if (!filePath) {
    return "File path cannot be empty";
  }
  try {
    fs.accessSync(filePath, fs.constants.R_OK);
  } catch {
    return `File '${filePath}' does not exist or is not readable`;
  }
  if (!fs.statSync(filePath).isFile()) {
    return `'${filePath}' is not a file`;
  }
  return undefined;
}
