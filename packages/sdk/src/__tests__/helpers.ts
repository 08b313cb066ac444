/**
 * Shared stand-ins for the SDK tests
 */

import { generateKeyPairSync } from "crypto";
import * as fs from "fs";
import * as http from "http";
import * as os from "os";
import * as path from "path";

import type {
  ContainerRuntime,
  RuntimeCallOptions,
  TrustEnvironment,
} from "../client/common/docker/runtime";
import type { DeploymentConfigFile } from "../client/common/config/deploymentConfig";
import type { CloudEnvironmentConfig, Logger, RegistryCredentials } from "../client/common/types";

export const TEST_PASSPHRASE = "test-secret";

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "hpvs-deploy-test-"));
  try {
    return await fn(dir);
  } finally {
    await fs.promises.rm(dir, { recursive: true, force: true });
  }
}

export interface KeyFiles {
  publicKeyFile: string;
  privateKeyFile: string;
  publicKeyPem: string;
  privateKeyPem: string;
}

/**
 * Write an RSA key pair to dir; the private key is encrypted with TEST_PASSPHRASE
 */
export function writeKeyPair(dir: string, name: string): KeyFiles {
  const { publicKey, privateKey } = generateKeyPairSync("rsa", {
    modulusLength: 2048,
    publicKeyEncoding: { type: "spki", format: "pem" },
    privateKeyEncoding: {
      type: "pkcs8",
      format: "pem",
      cipher: "aes-256-cbc",
      passphrase: TEST_PASSPHRASE,
    },
  });
  const publicKeyFile = path.join(dir, `${name}.pub.pem`);
  const privateKeyFile = path.join(dir, `${name}.pem`);
  fs.writeFileSync(publicKeyFile, publicKey);
  fs.writeFileSync(privateKeyFile, privateKey);
  return { publicKeyFile, privateKeyFile, publicKeyPem: publicKey, privateKeyPem: privateKey };
}

// ==================== Logger ====================

export interface RecordingLogger extends Logger {
  lines: { level: "debug" | "info" | "warn" | "error"; message: string }[];
}

export function createRecordingLogger(): RecordingLogger {
  const lines: RecordingLogger["lines"] = [];
  return {
    lines,
    debug: (message: string) => lines.push({ level: "debug", message }),
    info: (message: string) => lines.push({ level: "info", message }),
    warn: (message: string) => lines.push({ level: "warn", message }),
    error: (message: string) => lines.push({ level: "error", message }),
  };
}

// ==================== Container runtime ====================

export type RuntimeMethod = keyof ContainerRuntime;

export interface RuntimeCall {
  method: RuntimeMethod;
  args: unknown[];
}

/**
 * Records every call; methods listed in `failures` reject with the given error
 */
export class FakeContainerRuntime implements ContainerRuntime {
  readonly calls: RuntimeCall[] = [];

  constructor(private readonly failures: Partial<Record<RuntimeMethod, Error>> = {}) {}

  callsTo(method: RuntimeMethod): RuntimeCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  async pull(imageRef: string, _options?: RuntimeCallOptions): Promise<void> {
    this.record("pull", [imageRef]);
  }

  async tag(sourceRef: string, targetRepository: string, tag: string): Promise<void> {
    this.record("tag", [sourceRef, targetRepository, tag]);
  }

  async login(
    registryUrl: string,
    credentials: RegistryCredentials,
    _options?: RuntimeCallOptions,
  ): Promise<void> {
    this.record("login", [registryUrl, credentials.username]);
  }

  async logout(registryUrl: string): Promise<void> {
    this.record("logout", [registryUrl]);
  }

  async loadTrustKey(
    privateKeyFile: string,
    keyName: string,
    _passphrase: string,
    _options?: RuntimeCallOptions,
  ): Promise<void> {
    this.record("loadTrustKey", [privateKeyFile, keyName]);
  }

  async addTrustSigner(
    keyName: string,
    publicKeyFile: string,
    repository: string,
    _trust: TrustEnvironment,
    _options?: RuntimeCallOptions,
  ): Promise<void> {
    this.record("addTrustSigner", [keyName, publicKeyFile, repository]);
  }

  async pushSigned(
    imageRef: string,
    trust: TrustEnvironment,
    _options?: RuntimeCallOptions,
  ): Promise<void> {
    this.record("pushSigned", [imageRef, trust.signingPassphrase]);
  }

  private record(method: RuntimeMethod, args: unknown[]): void {
    this.calls.push({ method, args });
    const failure = this.failures[method];
    if (failure) {
      throw failure;
    }
  }
}

// ==================== Cloud API ====================

export interface RecordedRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export interface StubResponse {
  status: number;
  body?: unknown;
}

export type StubHandler = (req: RecordedRequest) => StubResponse;

/**
 * In-process HTTP stand-in for the IAM and resource controller endpoints.
 * Routes are keyed by "METHOD /path"; unknown routes answer 404.
 */
export class FakeCloudServer {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, StubHandler>();
  private readonly server = http.createServer((req, res) => this.handle(req, res));

  route(key: string, handler: StubHandler | StubResponse): this {
    if (typeof handler === "function") {
      this.routes.set(key, handler);
    } else {
      const response = handler;
      this.routes.set(key, () => response);
    }
    return this;
  }

  /** "METHOD /path" of every request, in arrival order */
  get requestLog(): string[] {
    return this.requests.map((req) => `${req.method} ${req.path}`);
  }

  async start(): Promise<string> {
    await new Promise<void>((resolve) => this.server.listen(0, "127.0.0.1", resolve));
    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Stand-in server has no TCP address");
    }
    return `http://127.0.0.1:${address.port}`;
  }

  async stop(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      this.server.close((err) => (err ? reject(err) : resolve())),
    );
  }

  private handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const url = new URL(req.url ?? "/", "http://127.0.0.1");
      const recorded: RecordedRequest = {
        method: req.method ?? "GET",
        path: url.pathname,
        query: url.searchParams,
        headers: req.headers,
        body: Buffer.concat(chunks).toString("utf-8"),
      };
      this.requests.push(recorded);

      const handler = this.routes.get(`${recorded.method} ${recorded.path}`);
      const response = handler ? handler(recorded) : { status: 404, body: { message: "not found" } };
      const payload =
        typeof response.body === "string" ? response.body : JSON.stringify(response.body ?? {});
      res.writeHead(response.status, {
        "Content-Type": typeof response.body === "string" ? "text/plain" : "application/json",
      });
      res.end(payload);
    });
  }
}

export function testEnvironment(baseUrl: string): CloudEnvironmentConfig {
  return {
    name: "test",
    iamUrl: baseUrl,
    resourceControllerUrl: baseUrl,
    registrationKeyUrl: `${baseUrl}/registration-key.pem`,
  };
}

/** Token response that stays valid for an hour */
export function tokenResponse(accessToken = "test-token"): StubResponse {
  return {
    status: 200,
    body: {
      access_token: accessToken,
      expiration: Math.floor(Date.now() / 1000) + 3600,
      token_type: "Bearer",
    },
  };
}

// ==================== Configuration ====================

/** Smallest file the resolver accepts; key paths are relative to the config directory */
export function baseConfigFile(): DeploymentConfigFile {
  return {
    registry: { namespace: "acme", username: "builder", password: "test-password" },
    trust: { rootPassphrase: "test-root" },
    vendorKey: {
      name: "vendor",
      publicKeyFile: "vendor.pub.pem",
      privateKeyFile: "vendor.pem",
      passphrase: TEST_PASSPHRASE,
    },
  };
}
