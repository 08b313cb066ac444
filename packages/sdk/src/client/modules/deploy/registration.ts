/**
 * Registration builder
 *
 * Builds the registration document that tells the hosting service where the
 * signed image lives and how to pull it, signs it with the vendor key and
 * encrypts it for the service's recipient key. Only the ciphertext is left
 * on disk.
 */

import * as fs from "fs";

import { Keyring, RecipientKey } from "../../common/encryption/keyring";
import {
  assertNotCancelled,
  CryptoError,
  DeploymentError,
  errorMessage,
} from "../../common/errors";
import {
  EncryptedRegistrationArtifact,
  Logger,
  RegistrationDocument,
  RegistryCredentials,
} from "../../common/types";

export interface BuildAndSealOptions {
  registrationFilePath: string;
  vendorPublicKeyFile: string;
  vendorPrivateKeyFile: string;
  vendorKeyName: string;
  vendorKeyPassphrase: string;
  registryCredentials: RegistryCredentials;
  namespace: string;
  repository: string;
  registryUrl: string;
  /** Imported from the keyring's well-known source when omitted */
  recipient?: RecipientKey;
  /** Pinned JWK thumbprint the recipient key must match */
  expectedRecipientFingerprint?: string;
  signal?: AbortSignal;
}

export function buildRegistrationDocument(
  vendorPublicKeyPem: string,
  credentials: RegistryCredentials,
  namespace: string,
  repository: string,
  registryUrl: string,
): RegistrationDocument {
  return {
    key: vendorPublicKeyPem,
    registry: registryUrl,
    namespace,
    repository_name: `${namespace}/${repository}`,
    auth: { username: credentials.username, password: credentials.password },
  };
}

/**
 * Build, sign and encrypt the registration file
 */
export async function buildAndSealRegistration(
  options: BuildAndSealOptions,
  keyring: Keyring,
  logger: Logger,
): Promise<EncryptedRegistrationArtifact> {
  const { registrationFilePath, vendorKeyName, signal } = options;

  // 1. Vendor key pair
  const vendorKey = await keyringCall(`Failed to import public key '${vendorKeyName}'`, () =>
    keyring.importPublicKey(vendorKeyName, options.vendorPublicKeyFile),
  );
  await keyringCall(`Failed to import private key '${vendorKeyName}'`, () =>
    keyring.importPrivateKey(
      vendorKeyName,
      options.vendorPrivateKeyFile,
      options.vendorKeyPassphrase,
    ),
  );
  logger.info(`Imported vendor key '${vendorKeyName}' (${vendorKey.fingerprint})`);

  // 2. Recipient key
  assertNotCancelled(signal, "recipient key import");
  const recipient =
    options.recipient ??
    (await keyringCall("Failed to import the registration recipient key", () =>
      keyring.importRecipientKey(),
    ));
  if (
    options.expectedRecipientFingerprint &&
    options.expectedRecipientFingerprint !== recipient.fingerprint
  ) {
    throw new CryptoError(
      `Registration recipient key fingerprint ${recipient.fingerprint} does not match the pinned ${options.expectedRecipientFingerprint}`,
    );
  }
  logger.info(`Imported the registration recipient key (${recipient.fingerprint})`);

  // 3. Cleartext document
  const document = buildRegistrationDocument(
    vendorKey.publicKeyPem,
    options.registryCredentials,
    options.namespace,
    options.repository,
    options.registryUrl,
  );
  const cleartext = JSON.stringify(document, null, 2);
  const tempPath = `${registrationFilePath}.${process.pid}.tmp`;

  try {
    await writePrivateFile(registrationFilePath, cleartext);
    logger.debug(`Wrote registration definition to '${registrationFilePath}'`);

    // 4. Sign, encrypt, and replace the cleartext with the ciphertext
    assertNotCancelled(signal, "registration signing");
    const signed = await keyringCall(`Signing with '${vendorKeyName}' failed`, () =>
      keyring.sign(vendorKeyName, new TextEncoder().encode(cleartext)),
    );

    assertNotCancelled(signal, "registration encryption");
    const ciphertext = await keyringCall("Encryption for recipient failed", () =>
      keyring.encryptForRecipient(recipient, new TextEncoder().encode(signed)),
    );

    assertNotCancelled(signal, "registration file replacement");
    await writePrivateFile(tempPath, ciphertext);
    await fs.promises.rename(tempPath, registrationFilePath);

    logger.info(`Encrypted and signed registration file '${registrationFilePath}'`);
    return {
      path: registrationFilePath,
      ciphertext,
      signerKeyName: vendorKeyName,
      recipientFingerprint: recipient.fingerprint,
    };
  } catch (err) {
    // Neither cleartext credentials nor a half-written artifact may remain
    await fs.promises.rm(registrationFilePath, { force: true });
    await fs.promises.rm(tempPath, { force: true });
    if (err instanceof DeploymentError) {
      throw err;
    }
    throw new DeploymentError(
      `Failed to write registration file '${registrationFilePath}': ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

/**
 * Run a keyring operation; failures outside the error taxonomy become CryptoError
 */
async function keyringCall<T>(context: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    if (err instanceof DeploymentError) {
      throw err;
    }
    throw new CryptoError(`${context}: ${errorMessage(err)}`, { cause: err });
  }
}

async function writePrivateFile(filePath: string, content: string): Promise<void> {
  await fs.promises.writeFile(filePath, content, { mode: 0o600 });
  // writeFile only applies the mode when it creates the file
  await fs.promises.chmod(filePath, 0o600);
}
