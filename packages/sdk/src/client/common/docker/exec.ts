/**
 * Docker CLI invocation
 *
 * Login, trust and signed push go through the docker CLI rather than dockerode:
 * the CLI owns the credential helpers and the local trust store.
 */

import * as child_process from "child_process";

import { CancelledError, TransientError } from "../errors";
import { Logger } from "../types";
import { logLines } from "../utils/logger";

export interface DockerCommandOptions {
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;
  /** Written to stdin, then stdin is closed */
  input?: string;
  timeoutMs: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface DockerCommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Non-zero exit of a docker command
 */
export class DockerCommandError extends Error {
  constructor(
    public readonly args: string[],
    public readonly exitCode: number | null,
    public readonly output: string,
  ) {
    super(`docker ${args[0]} ${args[1] ?? ""}`.trim() + ` failed: ${output || "Unknown error"}`);
    this.name = "DockerCommandError";
  }
}

/**
 * Run a docker CLI command, streaming its output to the logger at debug level
 */
export function runDockerCommand(
  args: string[],
  options: DockerCommandOptions,
): Promise<DockerCommandResult> {
  const { env, input, timeoutMs, signal, logger } = options;
  const label = `docker ${args[0]}`;

  if (signal?.aborted) {
    return Promise.reject(new CancelledError(`Cancelled before ${label}`));
  }

  return new Promise<DockerCommandResult>((resolve, reject) => {
    const child = child_process.spawn("docker", args, {
      env: { ...process.env, ...env },
      stdio: ["pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      fn();
    };

    const timer = setTimeout(() => {
      child.kill("SIGTERM");
      finish(() => reject(new TransientError(`${label} timed out after ${timeoutMs / 1000}s`)));
    }, timeoutMs);

    const onAbort = () => {
      child.kill("SIGTERM");
      finish(() => reject(new CancelledError(`${label} was cancelled`)));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    child.stdout?.on("data", (data: Buffer) => {
      const output = data.toString();
      stdout += output;
      logLines(output, (line) => logger?.debug(line));
    });

    child.stderr?.on("data", (data: Buffer) => {
      const output = data.toString();
      stderr += output;
      logLines(output, (line) => logger?.debug(line));
    });

    child.on("close", (code) => {
      finish(() => {
        if (code !== 0) {
          reject(new DockerCommandError(args, code, (stderr || stdout).trim()));
        } else {
          resolve({ stdout, stderr });
        }
      });
    });

    child.on("error", (error) => {
      finish(() => {
        const msg = error.message || String(error);
        if (msg.includes("ENOENT")) {
          reject(
            new Error(`Docker CLI not found. Please ensure Docker is installed and in your PATH.`),
          );
        } else {
          reject(new Error(`Failed to start ${label}: ${msg}`));
        }
      });
    });

    if (input !== undefined) {
      child.stdin?.end(input);
    } else {
      child.stdin?.end();
    }
  });
}

/**
 * Check if error output indicates a permission/auth issue
 */
export function isPermissionError(errMsg: string): boolean {
  const errLower = errMsg.toLowerCase();
  const permissionKeywords = [
    "denied",
    "unauthorized",
    "forbidden",
    "insufficient_scope",
    "authentication required",
    "incorrect username or password",
  ];

  return permissionKeywords.some((keyword) => errLower.includes(keyword));
}
