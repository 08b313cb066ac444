/**
 * Registration envelope
 *
 * The registration document is signed with the vendor key (compact JWS,
 * RS256) and the JWS is then encrypted for the recipient key (compact JWE,
 * RSA-OAEP-256 key wrapping + AES-256-GCM content encryption).
 */

import { Buffer } from "buffer";
import {
  CompactEncrypt,
  CompactSign,
  compactDecrypt,
  compactVerify,
  type CompactJWEHeaderParameters,
  type KeyLike,
} from "jose";

export const SIGNATURE_ALGORITHM = "RS256";
export const KEY_ENCRYPTION_ALGORITHM = "RSA-OAEP-256";
export const CONTENT_ENCRYPTION_ALGORITHM = "A256GCM";

/**
 * Sign a payload, returning a compact JWS
 */
export async function signCompact(
  signingKey: KeyLike,
  payload: Uint8Array,
  keyId: string,
): Promise<string> {
  return new CompactSign(payload)
    .setProtectedHeader({ alg: SIGNATURE_ALGORITHM, kid: keyId })
    .sign(signingKey);
}

/**
 * Encrypt data using RSA-OAEP-256 for key encryption and AES-256-GCM for data encryption
 */
export async function encryptRSAOAEPAndAES256GCM(
  encryptionKey: KeyLike,
  plaintext: Uint8Array | Buffer,
  protectedHeaders?: Record<string, string> | null,
): Promise<string> {
  const header: CompactJWEHeaderParameters = {
    alg: KEY_ENCRYPTION_ALGORITHM,
    enc: CONTENT_ENCRYPTION_ALGORITHM,
    ...(protectedHeaders || {}),
  };

  // jose wants a plain Uint8Array, not a Buffer subclass
  const plaintextBytes = new Uint8Array(plaintext);
  return new CompactEncrypt(plaintextBytes).setProtectedHeader(header).encrypt(encryptionKey);
}

/**
 * Decrypt an envelope and verify the embedded signature
 */
export async function openEnvelope(
  jwe: string,
  decryptionKey: KeyLike,
  verificationKey: KeyLike,
): Promise<{ payload: Uint8Array; keyId?: string }> {
  const { plaintext } = await compactDecrypt(jwe, decryptionKey, {
    keyManagementAlgorithms: [KEY_ENCRYPTION_ALGORITHM],
    contentEncryptionAlgorithms: [CONTENT_ENCRYPTION_ALGORITHM],
  });
  const { payload, protectedHeader } = await compactVerify(
    new TextDecoder().decode(plaintext),
    verificationKey,
    { algorithms: [SIGNATURE_ALGORITHM] },
  );
  return { payload, keyId: protectedHeader.kid };
}
