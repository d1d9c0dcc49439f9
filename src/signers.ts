/**
 * ECDSA P-256 signer for authorization keys.
 *
 * Authorization keys are base64-encoded PKCS#8 DER documents, optionally
 * labelled with a `wallet-auth:` prefix by the dashboard that issues them.
 */

import { p256 } from '@noble/curves/p256';
import { InvalidKeyMaterialError } from './exceptions.js';

/** Label some credential exports put in front of authorization keys. */
export const AUTHORIZATION_KEY_PREFIX = 'wallet-auth:';

// AlgorithmIdentifier { id-ecPublicKey, prime256v1 }
const P256_ALGORITHM_IDENTIFIER = new Uint8Array([
  0x30, 0x13,
  0x06, 0x07, 0x2a, 0x86, 0x48, 0xce, 0x3d, 0x02, 0x01, // ecPublicKey OID
  0x06, 0x08, 0x2a, 0x86, 0x48, 0xce, 0x3d, 0x03, 0x01, 0x07, // P-256 OID
]);

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Interface for signers that produce raw signature bytes over a message hash.
 */
export interface Signer {
  /**
   * Sign a 32-byte message hash and return the signature bytes.
   */
  sign(messageHash: Uint8Array): Uint8Array;

  /**
   * Return the public key in base64 format.
   */
  publicKey(): string;

  /**
   * Verify a signature (for testing purposes).
   */
  verify(signature: Uint8Array, messageHash: Uint8Array): boolean;
}

/**
 * ECDSA P-256 digital signature implementation.
 *
 * Signatures use RFC 6979 deterministic nonces and low-S normalization,
 * and are returned DER-encoded.
 */
export class P256Signer implements Signer {
  private readonly privateKey: Uint8Array;
  private readonly pubKey: Uint8Array;

  private constructor(privateKey: Uint8Array) {
    if (privateKey.length !== 32) {
      throw new InvalidKeyMaterialError(
        `ECDSA P-256 private key must be 32 bytes, got ${privateKey.length}`
      );
    }
    this.pubKey = derivePublicKey(privateKey);
    this.privateKey = privateKey;
  }

  /**
   * Sign a message hash using ECDSA P-256.
   *
   * @param messageHash - SHA-256 digest of the message
   * @returns DER-encoded ECDSA signature
   */
  sign(messageHash: Uint8Array): Uint8Array {
    return p256.sign(messageHash, this.privateKey).toDERRawBytes();
  }

  /**
   * Return the public key as base64 SubjectPublicKeyInfo DER, the format
   * the API expects when registering authorization keys.
   */
  publicKey(): string {
    return Buffer.from(this.publicKeySpki()).toString('base64');
  }

  /**
   * Return the uncompressed public key point.
   */
  publicKeyBytes(): Uint8Array {
    return this.pubKey;
  }

  /**
   * Return the public key in PEM format.
   */
  publicKeyPem(): string {
    return toPem('PUBLIC KEY', this.publicKeySpki());
  }

  /**
   * Return the private key as an authorization key string:
   * base64 PKCS#8 DER, without the `wallet-auth:` label.
   */
  toAuthorizationKey(): string {
    return Buffer.from(this.pkcs8()).toString('base64');
  }

  /**
   * Return the private key in PEM format (for storage).
   */
  privateKeyPem(): string {
    return toPem('PRIVATE KEY', this.pkcs8());
  }

  /**
   * Verify a DER-encoded signature (for testing purposes).
   */
  verify(signature: Uint8Array, messageHash: Uint8Array): boolean {
    try {
      return p256.verify(signature, messageHash, this.pubKey);
    } catch {
      return false;
    }
  }

  private publicKeySpki(): Uint8Array {
    const bitString = new Uint8Array([0x03, this.pubKey.length + 1, 0x00, ...this.pubKey]);
    const body = new Uint8Array([...P256_ALGORITHM_IDENTIFIER, ...bitString]);
    return new Uint8Array([0x30, body.length, ...body]);
  }

  private pkcs8(): Uint8Array {
    // Inner SEC1 ECPrivateKey without the optional parameters
    const ecVersion = new Uint8Array([0x02, 0x01, 0x01]);
    const privateKeyOctet = new Uint8Array([0x04, 0x20, ...this.privateKey]);
    const ecPrivateKey = new Uint8Array([
      0x30,
      ecVersion.length + privateKeyOctet.length,
      ...ecVersion,
      ...privateKeyOctet,
    ]);

    const pkcs8Version = new Uint8Array([0x02, 0x01, 0x00]);
    const privateKeyInfo = new Uint8Array([0x04, ecPrivateKey.length, ...ecPrivateKey]);

    const totalLen = pkcs8Version.length + P256_ALGORITHM_IDENTIFIER.length + privateKeyInfo.length;
    return new Uint8Array([
      0x30,
      totalLen,
      ...pkcs8Version,
      ...P256_ALGORITHM_IDENTIFIER,
      ...privateKeyInfo,
    ]);
  }

  /**
   * Load a signer from an authorization key string.
   *
   * Accepts base64 PKCS#8 or SEC1 DER, with or without the `wallet-auth:`
   * label. `"wallet-auth:<key>"` and `"<key>"` load the same key.
   *
   * @throws InvalidKeyMaterialError if the material cannot be decoded
   */
  static fromAuthorizationKey(material: string): P256Signer {
    const stripped = stripAuthorizationKeyPrefix(material).replace(/\s+/g, '');
    if (stripped.length === 0 || !BASE64_PATTERN.test(stripped)) {
      throw new InvalidKeyMaterialError('Authorization key is not valid base64');
    }
    return P256Signer.fromDer(Buffer.from(stripped, 'base64'));
  }

  /**
   * Load a signer from a PEM string.
   */
  static fromPem(pemString: string): P256Signer {
    const b64 = pemString
      .split('\n')
      .filter((line) => !line.startsWith('-----') && line.trim().length > 0)
      .join('');
    return P256Signer.fromAuthorizationKey(b64);
  }

  /**
   * Load a signer from a DER-encoded PKCS#8 or SEC1 private key.
   */
  static fromDer(der: Uint8Array): P256Signer {
    let privateKey: Uint8Array;
    try {
      privateKey = extractEcdsaPrivateKey(der);
    } catch (e) {
      if (e instanceof InvalidKeyMaterialError) throw e;
      throw new InvalidKeyMaterialError('Authorization key is not a DER-encoded EC private key', undefined, {
        cause: e,
      });
    }
    return new P256Signer(privateKey);
  }

  /**
   * Load a signer from a raw 32-byte private scalar.
   */
  static fromBytes(keyBytes: Uint8Array): P256Signer {
    return new P256Signer(keyBytes);
  }

  /**
   * Generate a new ECDSA P-256 keypair.
   */
  static generate(): { signer: P256Signer; publicKey: string } {
    const signer = new P256Signer(p256.utils.randomPrivateKey());
    return { signer, publicKey: signer.publicKey() };
  }
}

// Uncompressed SEC1 point (65 bytes)
function derivePublicKey(privateKey: Uint8Array): Uint8Array {
  try {
    return p256.getPublicKey(privateKey, false);
  } catch (e) {
    throw new InvalidKeyMaterialError('Private key scalar is outside the P-256 group order', undefined, {
      cause: e,
    });
  }
}

/**
 * Remove the `wallet-auth:` label from an authorization key, if present.
 */
export function stripAuthorizationKeyPrefix(material: string): string {
  const trimmed = material.trim();
  return trimmed.startsWith(AUTHORIZATION_KEY_PREFIX)
    ? trimmed.slice(AUTHORIZATION_KEY_PREFIX.length)
    : trimmed;
}

function toPem(label: string, der: Uint8Array): string {
  const b64 = Buffer.from(der).toString('base64');
  const lines = b64.match(/.{1,64}/g) ?? [];
  return `-----BEGIN ${label}-----\n${lines.join('\n')}\n-----END ${label}-----\n`;
}

/**
 * Extract ECDSA P-256 private key from DER-encoded PKCS#8 or SEC1 structure.
 */
function extractEcdsaPrivateKey(der: Uint8Array): Uint8Array {
  let offset = 0;

  if (readByte(der, offset) !== 0x30) throw new InvalidKeyMaterialError('Invalid key format: expected SEQUENCE');
  offset++;
  offset += readLength(der, offset).bytesRead;

  // INTEGER first means PKCS#8; SEC1 also starts with an INTEGER (version 1)
  // but is followed by an OCTET STRING rather than a SEQUENCE.
  if (readByte(der, offset) !== 0x02) {
    throw new InvalidKeyMaterialError('Invalid key format: expected INTEGER (version)');
  }
  offset++;
  const versionLen = readLength(der, offset);
  const afterVersion = offset + versionLen.bytesRead + versionLen.length;

  if (readByte(der, afterVersion) === 0x04) {
    return extractSec1PrivateKey(der);
  }

  offset = afterVersion;
  if (readByte(der, offset) !== 0x30) {
    throw new InvalidKeyMaterialError('Invalid PKCS#8: expected SEQUENCE (algorithm)');
  }
  const algLen = readLength(der, offset + 1);
  const algEnd = offset + 1 + algLen.bytesRead + algLen.length;
  if (!bytesEqual(der.subarray(offset, algEnd), P256_ALGORITHM_IDENTIFIER)) {
    throw new InvalidKeyMaterialError('Invalid PKCS#8: key is not an ECDSA P-256 key');
  }
  offset = algEnd;

  // privateKey OCTET STRING wraps the SEC1 structure
  if (readByte(der, offset) !== 0x04) throw new InvalidKeyMaterialError('Invalid PKCS#8: expected OCTET STRING');
  offset++;
  const octetLen = readLength(der, offset);
  offset += octetLen.bytesRead;

  return extractSec1PrivateKey(der.subarray(offset, offset + octetLen.length));
}

/**
 * Extract private key from SEC1 EC private key structure.
 */
function extractSec1PrivateKey(der: Uint8Array): Uint8Array {
  let offset = 0;

  if (readByte(der, offset) !== 0x30) throw new InvalidKeyMaterialError('Invalid SEC1: expected SEQUENCE');
  offset++;
  offset += readLength(der, offset).bytesRead;

  if (readByte(der, offset) !== 0x02) throw new InvalidKeyMaterialError('Invalid SEC1: expected INTEGER (version)');
  offset++;
  const versionLen = readLength(der, offset);
  offset += versionLen.bytesRead + versionLen.length;

  if (readByte(der, offset) !== 0x04) throw new InvalidKeyMaterialError('Invalid SEC1: expected OCTET STRING');
  offset++;
  const keyLen = readLength(der, offset);
  offset += keyLen.bytesRead;

  if (keyLen.length !== 32 || offset + 32 > der.length) {
    throw new InvalidKeyMaterialError(
      `Invalid ECDSA P-256 key length: expected 32, got ${keyLen.length}`
    );
  }

  return new Uint8Array(der.subarray(offset, offset + 32));
}

function readByte(der: Uint8Array, offset: number): number {
  if (offset >= der.length) {
    throw new InvalidKeyMaterialError('Invalid key format: unexpected end of data');
  }
  return der[offset];
}

/**
 * Read ASN.1 length field.
 */
function readLength(der: Uint8Array, offset: number): { length: number; bytesRead: number } {
  const firstByte = readByte(der, offset);

  if (firstByte < 0x80) {
    return { length: firstByte, bytesRead: 1 };
  }

  const numBytes = firstByte & 0x7f;
  if (numBytes === 0 || numBytes > 4) {
    throw new InvalidKeyMaterialError('Invalid key format: unsupported length encoding');
  }
  let length = 0;
  for (let i = 0; i < numBytes; i++) {
    length = length * 256 + readByte(der, offset + 1 + i);
  }
  return { length, bytesRead: 1 + numBytes };
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
