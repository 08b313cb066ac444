/**
 * Host architecture detection
 */

import * as os from "os";

import { TARGET_ARCHITECTURE } from "../constants";

// os.arch() names that identify the target architecture class
const TARGET_ARCH_ALIASES = new Set([TARGET_ARCHITECTURE, "s390"]);

export function getHostArchitecture(): string {
  return os.arch();
}

/**
 * Whether images built on this host can run on the hosting service
 */
export function canBuildForTarget(hostArch: string): boolean {
  return TARGET_ARCH_ALIASES.has(hostArch.toLowerCase());
}
