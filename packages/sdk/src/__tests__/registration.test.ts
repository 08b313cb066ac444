import { createPrivateKey, createPublicKey } from "crypto";
import * as fs from "fs";
import * as path from "path";
import { describe, expect, it } from "vitest";

import { openEnvelope } from "../client/common/encryption/envelope";
import { FileKeyring, keyFingerprint, type Keyring } from "../client/common/encryption/keyring";
import { createRecipientKeyFetcher } from "../client/common/encryption/recipient";
import { CancelledError, CryptoError } from "../client/common/errors";
import {
  buildAndSealRegistration,
  buildRegistrationDocument,
  type BuildAndSealOptions,
} from "../client/modules/deploy/registration";
import {
  createRecordingLogger,
  TEST_PASSPHRASE,
  testEnvironment,
  withTempDir,
  writeKeyPair,
  type KeyFiles,
} from "./helpers";

interface Fixture {
  dir: string;
  vendor: KeyFiles;
  recipient: KeyFiles;
  options: BuildAndSealOptions;
}

async function withFixture(fn: (fixture: Fixture) => Promise<void>): Promise<void> {
  await withTempDir(async (dir) => {
    const vendor = writeKeyPair(dir, "vendor");
    const recipient = writeKeyPair(dir, "recipient");
    const options: BuildAndSealOptions = {
      registrationFilePath: path.join(dir, "registration.txt"),
      vendorPublicKeyFile: vendor.publicKeyFile,
      vendorPrivateKeyFile: vendor.privateKeyFile,
      vendorKeyName: "vendor",
      vendorKeyPassphrase: TEST_PASSPHRASE,
      registryCredentials: { username: "builder", password: "test-password" },
      namespace: "acme",
      repository: "fhe-toolkit-fedora-s390x",
      registryUrl: "docker.io",
    };
    await fn({ dir, vendor, recipient, options });
  });
}

function keyringFor(recipient: KeyFiles): FileKeyring {
  return new FileKeyring(async () => recipient.publicKeyPem);
}

/** Delegates to another keyring, with single operations replaced */
function keyringWith(inner: Keyring, overrides: Partial<Keyring>): Keyring {
  return {
    importPublicKey: (name, file) => inner.importPublicKey(name, file),
    importPrivateKey: (name, file, passphrase) => inner.importPrivateKey(name, file, passphrase),
    importRecipientKey: () => inner.importRecipientKey(),
    encryptForRecipient: (key, plaintext) => inner.encryptForRecipient(key, plaintext),
    sign: (name, payload) => inner.sign(name, payload),
    ...overrides,
  };
}

describe("buildRegistrationDocument", () => {
  it("points at the namespaced repository", () => {
    expect(
      buildRegistrationDocument(
        "PEM",
        { username: "builder", password: "test-password" },
        "acme",
        "fhe-toolkit-ubuntu-s390x",
        "docker.io",
      ),
    ).toEqual({
      key: "PEM",
      registry: "docker.io",
      namespace: "acme",
      repository_name: "acme/fhe-toolkit-ubuntu-s390x",
      auth: { username: "builder", password: "test-password" },
    });
  });
});

describe("buildAndSealRegistration", () => {
  it("leaves only the ciphertext, which decrypts and verifies to the document", async () => {
    await withFixture(async ({ dir, vendor, recipient, options }) => {
      const artifact = await buildAndSealRegistration(
        options,
        keyringFor(recipient),
        createRecordingLogger(),
      );

      expect(artifact.path).toBe(options.registrationFilePath);
      expect(artifact.signerKeyName).toBe("vendor");
      expect(artifact.recipientFingerprint).toBe(
        await keyFingerprint(createPublicKey(recipient.publicKeyPem)),
      );
      expect(artifact.ciphertext.split(".")).toHaveLength(5);
      expect(fs.readFileSync(artifact.path, "utf-8")).toBe(artifact.ciphertext);
      expect(fs.statSync(artifact.path).mode & 0o777).toBe(0o600);
      expect(fs.readdirSync(dir).filter((f) => f.endsWith(".tmp"))).toEqual([]);

      const { payload, keyId } = await openEnvelope(
        artifact.ciphertext,
        createPrivateKey({ key: recipient.privateKeyPem, passphrase: TEST_PASSPHRASE }),
        createPublicKey(vendor.publicKeyPem),
      );
      expect(keyId).toBe("vendor");
      expect(JSON.parse(new TextDecoder().decode(payload))).toEqual({
        key: createPublicKey(vendor.publicKeyPem).export({ type: "spki", format: "pem" }).toString(),
        registry: "docker.io",
        namespace: "acme",
        repository_name: "acme/fhe-toolkit-fedora-s390x",
        auth: { username: "builder", password: "test-password" },
      });
    });
  });

  it("accepts a recipient key matching the pinned fingerprint", async () => {
    await withFixture(async ({ recipient, options }) => {
      const fingerprint = await keyFingerprint(createPublicKey(recipient.publicKeyPem));
      const artifact = await buildAndSealRegistration(
        { ...options, expectedRecipientFingerprint: fingerprint },
        keyringFor(recipient),
        createRecordingLogger(),
      );
      expect(artifact.recipientFingerprint).toBe(fingerprint);
    });
  });

  it("rejects a recipient key that does not match the pinned fingerprint", async () => {
    await withFixture(async ({ recipient, options }) => {
      await expect(
        buildAndSealRegistration(
          { ...options, expectedRecipientFingerprint: "not-the-fingerprint" },
          keyringFor(recipient),
          createRecordingLogger(),
        ),
      ).rejects.toBeInstanceOf(CryptoError);
      expect(fs.existsSync(options.registrationFilePath)).toBe(false);
    });
  });

  it("fails with CryptoError on a wrong vendor key passphrase", async () => {
    await withFixture(async ({ recipient, options }) => {
      await expect(
        buildAndSealRegistration(
          { ...options, vendorKeyPassphrase: "wrong-secret" },
          keyringFor(recipient),
          createRecordingLogger(),
        ),
      ).rejects.toBeInstanceOf(CryptoError);
      expect(fs.existsSync(options.registrationFilePath)).toBe(false);
    });
  });

  it("fails with CryptoError when the private key does not match the public key", async () => {
    await withFixture(async ({ recipient, options }) => {
      await expect(
        buildAndSealRegistration(
          { ...options, vendorPublicKeyFile: recipient.publicKeyFile },
          keyringFor(recipient),
          createRecordingLogger(),
        ),
      ).rejects.toThrow("Private key 'vendor' does not match the imported public key");
    });
  });

  it("fails with CryptoError when the recipient key cannot be fetched", async () => {
    await withFixture(async ({ options }) => {
      const keyring = new FileKeyring(async () => {
        throw new Error("connect ECONNREFUSED");
      });
      await expect(
        buildAndSealRegistration(options, keyring, createRecordingLogger()),
      ).rejects.toThrow(
        "Failed to fetch the registration recipient key: connect ECONNREFUSED",
      );
    });
  });

  it("reports a failing key import from any keyring as CryptoError", async () => {
    await withFixture(async ({ recipient, options }) => {
      const keyring = keyringWith(keyringFor(recipient), {
        importPublicKey: async () => {
          throw new Error("no valid key data found");
        },
      });

      const err = await buildAndSealRegistration(options, keyring, createRecordingLogger()).catch(
        (e: unknown) => e,
      );

      expect(err).toBeInstanceOf(CryptoError);
      expect(err).toHaveProperty("message", "Failed to import public key 'vendor': no valid key data found");
      expect(fs.existsSync(options.registrationFilePath)).toBe(false);
    });
  });

  it("reports a failing encryption as CryptoError and removes the cleartext", async () => {
    await withFixture(async ({ recipient, options }) => {
      const keyring = keyringWith(keyringFor(recipient), {
        encryptForRecipient: async () => {
          throw new Error("unsupported key size");
        },
      });

      const err = await buildAndSealRegistration(options, keyring, createRecordingLogger()).catch(
        (e: unknown) => e,
      );

      expect(err).toBeInstanceOf(CryptoError);
      expect(err).toHaveProperty("message", "Encryption for recipient failed: unsupported key size");
      expect(fs.existsSync(options.registrationFilePath)).toBe(false);
    });
  });

  it("reports a cancelled recipient key fetch as cancellation", async () => {
    await withFixture(async ({ options }) => {
      const controller = new AbortController();
      controller.abort();
      const keyring = new FileKeyring(
        createRecipientKeyFetcher(testEnvironment("http://127.0.0.1:1"), {
          signal: controller.signal,
        }),
      );

      await expect(
        buildAndSealRegistration(options, keyring, createRecordingLogger()),
      ).rejects.toBeInstanceOf(CancelledError);
    });
  });

  it("removes the cleartext when cancelled between signing and encryption", async () => {
    await withFixture(async ({ dir, recipient, options }) => {
      const controller = new AbortController();
      const inner = keyringFor(recipient);
      const keyring = keyringWith(inner, {
        sign: async (name, payload) => {
          const signed = await inner.sign(name, payload);
          controller.abort();
          return signed;
        },
      });

      await expect(
        buildAndSealRegistration(
          { ...options, signal: controller.signal },
          keyring,
          createRecordingLogger(),
        ),
      ).rejects.toBeInstanceOf(CancelledError);
      expect(fs.existsSync(options.registrationFilePath)).toBe(false);
      expect(fs.readdirSync(dir).filter((f) => f.startsWith("registration"))).toEqual([]);
    });
  });
});
