/**
 * Mina Key Codec
 *
 * Thin capability layer over the signing libraries:
 * - mina-signer for key generation, public key derivation and address checks
 * - bs58check for the version-byte + checksum envelope of keys and addresses
 *
 * No curve arithmetic happens here. Every failure is thrown as a KeyCodecError
 * carrying the library's detail; the wallet layer turns those into results.
 */

import Client from 'mina-signer';
import bs58check from 'bs58check';
import type { KeyPair, PublicKeyComponents } from '../utils/types.js';
import { toError } from '../utils/types.js';

const SECRET_KEY_VERSION_BYTE = 0x5a;
const PUBLIC_KEY_VERSION_BYTE = 0xcb;
const VERSION_NUMBER = 0x01;
const FIELD_BYTES = 32;

const SECRET_KEY_HEADER = [SECRET_KEY_VERSION_BYTE, VERSION_NUMBER];
// Addresses carry a second version number for the compressed point
const ADDRESS_HEADER = [PUBLIC_KEY_VERSION_BYTE, VERSION_NUMBER, VERSION_NUMBER];

// Order of the Pallas group, i.e. the modulus of the secret scalar field
const SCALAR_FIELD_ORDER = BigInt(
  '0x40000000000000000000000000000000224698fc0994a8dd8c46eb2100000001'
);

const HEX_FIELD_PATTERN = /^[0-9a-fA-F]{64}$/;

export class KeyCodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyCodecError';
  }
}

/**
 * Capabilities the wallet layer needs from the signing library.
 * Secret keys travel in the library's Base58Check form.
 */
export interface KeyCodec {
  generate(): KeyPair;
  decodeHex(secretHex: string): string;
  decodeBase58(secretBase58: string): string;
  encodeHex(secretBase58: string): string;
  encodeBase58(secretBase58: string): string;
  derivePublicKey(secretBase58: string): string;
  parseAddress(address: string): PublicKeyComponents;
  encodeAddress(publicKey: PublicKeyComponents): string;
}

function decodeCheck(text: string, what: string): Uint8Array {
  try {
    return bs58check.decode(text);
  } catch (error) {
    throw new KeyCodecError(`${what} is not valid base58check: ${toError(error).message}`);
  }
}

function assertHeader(payload: Uint8Array, header: readonly number[], what: string): void {
  header.forEach((expected, index) => {
    if (payload[index] !== expected) {
      throw new KeyCodecError(
        `unexpected ${what} version byte 0x${payload[index].toString(16)} at offset ${index}`
      );
    }
  });
}

function assertScalarInRange(scalarHexBigEndian: string): void {
  const scalar = BigInt(`0x${scalarHexBigEndian}`);
  if (scalar === BigInt(0)) {
    throw new KeyCodecError('secret scalar must not be zero');
  }
  if (scalar >= SCALAR_FIELD_ORDER) {
    throw new KeyCodecError('secret scalar is outside the scalar field');
  }
}

/**
 * Unwrap a secret key payload and return its scalar as big-endian hex
 */
function secretScalarHex(secretBase58: string): string {
  const payload = decodeCheck(secretBase58, 'secret key');
  const expectedLength = SECRET_KEY_HEADER.length + FIELD_BYTES;

  if (payload.length !== expectedLength) {
    throw new KeyCodecError(
      `secret key payload must be ${expectedLength} bytes, got ${payload.length}`
    );
  }
  assertHeader(payload, SECRET_KEY_HEADER, 'secret key');

  // Scalars are little-endian inside base58 and big-endian in hex
  const scalarHex = Buffer.from(payload.subarray(SECRET_KEY_HEADER.length))
    .reverse()
    .toString('hex');
  assertScalarInRange(scalarHex);
  return scalarHex;
}

/**
 * MinaKeyCodec - mina-signer backed KeyCodec
 */
export class MinaKeyCodec implements KeyCodec {
  private client: Client;

  constructor(client: Client = new Client({ network: 'mainnet' })) {
    // Keys and addresses are identical on every network, so one client serves all
    this.client = client;
  }

  generate(): KeyPair {
    try {
      const { privateKey, publicKey } = this.client.genKeys();
      return { privateKey, publicKey };
    } catch (error) {
      throw new KeyCodecError(toError(error).message);
    }
  }

  decodeHex(secretHex: string): string {
    if (!HEX_FIELD_PATTERN.test(secretHex)) {
      throw new KeyCodecError(
        `secret key hex must be exactly ${FIELD_BYTES * 2} hexadecimal characters`
      );
    }
    assertScalarInRange(secretHex);

    const payload = Buffer.concat([
      Buffer.from(SECRET_KEY_HEADER),
      Buffer.from(secretHex, 'hex').reverse(),
    ]);
    return bs58check.encode(payload);
  }

  decodeBase58(secretBase58: string): string {
    secretScalarHex(secretBase58);
    return secretBase58;
  }

  encodeHex(secretBase58: string): string {
    return secretScalarHex(secretBase58);
  }

  encodeBase58(secretBase58: string): string {
    return secretBase58;
  }

  derivePublicKey(secretBase58: string): string {
    try {
      return this.client.derivePublicKey(secretBase58);
    } catch (error) {
      throw new KeyCodecError(`public key derivation failed: ${toError(error).message}`);
    }
  }

  parseAddress(address: string): PublicKeyComponents {
    const payload = decodeCheck(address, 'address');
    const expectedLength = ADDRESS_HEADER.length + FIELD_BYTES + 1;

    if (payload.length !== expectedLength) {
      throw new KeyCodecError(
        `address payload must be ${expectedLength} bytes, got ${payload.length}`
      );
    }
    assertHeader(payload, ADDRESS_HEADER, 'address');

    const parity = payload[expectedLength - 1];
    if (parity !== 0 && parity !== 1) {
      throw new KeyCodecError(`unexpected parity byte ${parity}`);
    }

    try {
      this.client.publicKeyToRaw(address);
    } catch (error) {
      throw new KeyCodecError(`address rejected: ${toError(error).message}`);
    }

    return {
      x: Buffer.from(payload.subarray(ADDRESS_HEADER.length, expectedLength - 1)).toString('hex'),
      isOdd: parity === 1,
    };
  }

  encodeAddress(publicKey: PublicKeyComponents): string {
    if (!HEX_FIELD_PATTERN.test(publicKey.x)) {
      throw new KeyCodecError('x-coordinate must be 64 hexadecimal characters');
    }

    const payload = Buffer.concat([
      Buffer.from(ADDRESS_HEADER),
      Buffer.from(publicKey.x, 'hex'),
      Buffer.from([publicKey.isOdd ? 1 : 0]),
    ]);
    return bs58check.encode(payload);
  }
}

// Singleton instance
let keyCodecInstance: KeyCodec | null = null;

export function getKeyCodec(): KeyCodec {
  if (!keyCodecInstance) {
    keyCodecInstance = new MinaKeyCodec();
  }
  return keyCodecInstance;
}
