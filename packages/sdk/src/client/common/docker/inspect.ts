/**
 * Docker image inspection, pull and tag
 */

import Docker from "dockerode";
import { Readable } from "stream";

import { CancelledError, TransientError } from "../errors";
import { Logger } from "../types";

/**
 * Check if an image is present in the local image store
 */
export async function imageExists(docker: Docker, imageRef: string): Promise<boolean> {
  try {
    await docker.getImage(imageRef).inspect();
    return true;
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Tag a local image as repo:tag
 */
export async function tagDockerImage(
  docker: Docker,
  sourceRef: string,
  repo: string,
  tag: string,
): Promise<void> {
  if (!(await imageExists(docker, sourceRef))) {
    throw new Error(`No such image: ${sourceRef}`);
  }
  await docker.getImage(sourceRef).tag({ repo, tag });
}

/** The part of the docker client a pull needs */
export interface ImagePuller {
  pull(
    repoTag: string,
    options: { platform: string; abortSignal?: AbortSignal },
    callback: (err: Error | null, stream?: NodeJS.ReadableStream) => void,
  ): unknown;
  modem: {
    followProgress(
      stream: NodeJS.ReadableStream,
      onFinished: (err: Error | null) => void,
      onProgress?: (event: { status?: string }) => void,
    ): void;
  };
}

/**
 * Pull Docker image. Abort and timeout close the pull stream.
 */
export async function pullDockerImage(
  docker: ImagePuller,
  imageTag: string,
  options: { platform: string; timeoutMs: number; signal?: AbortSignal },
  logger?: Logger,
): Promise<void> {
  const { platform, timeoutMs, signal } = options;
  logger?.info(`Pulling image ${imageTag}...`);

  return new Promise((resolve, reject) => {
    let settled = false;
    let pullStream: NodeJS.ReadableStream | undefined;
    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      fn();
    };

    const timer = setTimeout(() => {
      closeStream(pullStream);
      finish(() =>
        reject(new TransientError(`Pull of ${imageTag} timed out after ${timeoutMs / 1000}s`)),
      );
    }, timeoutMs);
    const onAbort = () => {
      closeStream(pullStream);
      finish(() => reject(new CancelledError(`Pull of ${imageTag} was cancelled`)));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    docker.pull(imageTag, { platform, abortSignal: signal }, (err, stream) => {
      if (err || !stream) {
        finish(() =>
          reject(new Error(`Failed to pull image ${imageTag}: ${err?.message ?? "no stream"}`)),
        );
        return;
      }
      if (settled) {
        closeStream(stream);
        return;
      }
      pullStream = stream;

      // Must consume the stream to ensure pull completes
      docker.modem.followProgress(
        stream,
        (err) => {
          finish(() => {
            if (err) {
              reject(new Error(`Failed to complete image pull for ${imageTag}: ${err.message}`));
            } else {
              logger?.info(`Image pull completed: ${imageTag}`);
              resolve();
            }
          });
        },
        (event) => {
          if (event && event.status) {
            logger?.debug(event.status);
          }
        },
      );
    });
  });
}

function closeStream(stream: NodeJS.ReadableStream | undefined): void {
  if (stream instanceof Readable) {
    stream.destroy();
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    error.statusCode === 404
  );
}
