/**
 * Keyring for registration signing and encryption
 *
 * Keys are PEM files (SPKI or X.509 for public keys, PKCS#8 or PKCS#1 for
 * private keys, optionally passphrase protected) loaded into Node KeyObjects
 * and used through jose.
 */

import * as fs from "fs";
import { createPrivateKey, createPublicKey, type KeyObject } from "crypto";
import { calculateJwkThumbprint, exportJWK } from "jose";

import { CryptoError, DeploymentError, errorMessage } from "../errors";
import { encryptRSAOAEPAndAES256GCM, signCompact } from "./envelope";

export interface KeyHandle {
  name: string;
  /** JWK thumbprint (SHA-256) of the public key */
  fingerprint: string;
  publicKeyPem: string;
}

export interface RecipientKey {
  fingerprint: string;
  publicKey: KeyObject;
}

export interface Keyring {
  importPublicKey(name: string, keyFile: string): Promise<KeyHandle>;
  importPrivateKey(name: string, keyFile: string, passphrase: string): Promise<KeyHandle>;
  /** Import the well-known key registrations are encrypted for */
  importRecipientKey(): Promise<RecipientKey>;
  encryptForRecipient(recipient: RecipientKey, plaintext: Uint8Array): Promise<string>;
  sign(keyName: string, payload: Uint8Array): Promise<string>;
}

interface KeyEntry {
  publicKey: KeyObject;
  privateKey?: KeyObject;
  fingerprint: string;
}

/**
 * Fingerprint of a public key
 */
export async function keyFingerprint(publicKey: KeyObject): Promise<string> {
  return calculateJwkThumbprint(await exportJWK(publicKey), "sha256");
}

/**
 * In-memory keyring over key files on disk
 */
export class FileKeyring implements Keyring {
  private readonly keys = new Map<string, KeyEntry>();

  /**
   * @param fetchRecipientKey - returns the recipient public key PEM from its well-known source
   */
  constructor(private readonly fetchRecipientKey: () => Promise<string>) {}

  async importPublicKey(name: string, keyFile: string): Promise<KeyHandle> {
    const publicKey = parsePublicKey(readKeyFile(keyFile, name), name);
    const fingerprint = await keyFingerprint(publicKey);

    const existing = this.keys.get(name);
    if (existing) {
      if (existing.fingerprint !== fingerprint) {
        throw new CryptoError(`Key '${name}' is already in the keyring with a different public key`);
      }
      return toHandle(name, existing);
    }

    const entry: KeyEntry = { publicKey, fingerprint };
    this.keys.set(name, entry);
    return toHandle(name, entry);
  }

  async importPrivateKey(name: string, keyFile: string, passphrase: string): Promise<KeyHandle> {
    let privateKey: KeyObject;
    try {
      privateKey = createPrivateKey({ key: readKeyFile(keyFile, name), format: "pem", passphrase });
    } catch (err) {
      throw new CryptoError(`Failed to import private key '${name}': ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const publicKey = createPublicKey(privateKey);
    const fingerprint = await keyFingerprint(publicKey);

    const existing = this.keys.get(name);
    if (existing && existing.fingerprint !== fingerprint) {
      throw new CryptoError(`Private key '${name}' does not match the imported public key`);
    }

    const entry: KeyEntry = { publicKey: existing?.publicKey ?? publicKey, privateKey, fingerprint };
    this.keys.set(name, entry);
    return toHandle(name, entry);
  }

  async importRecipientKey(): Promise<RecipientKey> {
    let pem: string;
    try {
      pem = await this.fetchRecipientKey();
    } catch (err) {
      if (err instanceof DeploymentError) throw err;
      throw new CryptoError(`Failed to fetch the registration recipient key: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    const publicKey = parsePublicKey(pem, "registration recipient");
    return { publicKey, fingerprint: await keyFingerprint(publicKey) };
  }

  async encryptForRecipient(recipient: RecipientKey, plaintext: Uint8Array): Promise<string> {
    try {
      return await encryptRSAOAEPAndAES256GCM(recipient.publicKey, plaintext, { cty: "JWT" });
    } catch (err) {
      throw new CryptoError(`Encryption for recipient failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async sign(keyName: string, payload: Uint8Array): Promise<string> {
    const privateKey = this.keys.get(keyName)?.privateKey;
    if (!privateKey) {
      throw new CryptoError(`No private key named '${keyName}' in the keyring`);
    }
    try {
      return await signCompact(privateKey, payload, keyName);
    } catch (err) {
      throw new CryptoError(`Signing with '${keyName}' failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function readKeyFile(keyFile: string, name: string): string {
  try {
    return fs.readFileSync(keyFile, "utf-8");
  } catch (err) {
    throw new CryptoError(`Cannot read key file '${keyFile}' for '${name}': ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

function parsePublicKey(pem: string, name: string): KeyObject {
  try {
    const key = createPublicKey(pem);
    if (key.asymmetricKeyType !== "rsa") {
      throw new Error(`expected an RSA key, got ${key.asymmetricKeyType ?? "unknown"}`);
    }
    return key;
  } catch (err) {
    throw new CryptoError(`Failed to import public key '${name}': ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

function toHandle(name: string, entry: KeyEntry): KeyHandle {
  return {
    name,
    fingerprint: entry.fingerprint,
    publicKeyPem: entry.publicKey.export({ type: "spki", format: "pem" }).toString(),
  };
}
