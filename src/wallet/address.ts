/**
 * Address validation and public key conversion
 */

import type { KeyCodec } from '../keys/index.js';
import { getKeyCodec } from '../keys/index.js';
import {
  type PublicKeyComponents,
  type Result,
  success,
  failure,
  toError,
} from '../utils/types.js';
import { WalletError } from './wallet-error.js';

/**
 * Check that an address parses into a public key.
 * On success the parsed key is returned so callers need not parse twice.
 */
export function validateAddress(
  address: string,
  codec: KeyCodec = getKeyCodec()
): Result<PublicKeyComponents, WalletError> {
  try {
    return success(codec.parseAddress(address));
  } catch (error) {
    return failure(WalletError.invalidAddress(toError(error).message));
  }
}

export function addressToPublicKey(
  address: string,
  codec: KeyCodec = getKeyCodec()
): Result<PublicKeyComponents, WalletError> {
  return validateAddress(address, codec);
}

export function publicKeyToAddress(
  publicKey: PublicKeyComponents,
  codec: KeyCodec = getKeyCodec()
): Result<string, WalletError> {
  try {
    return success(codec.encodeAddress(publicKey));
  } catch (error) {
    return failure(WalletError.invalidAddress(toError(error).message));
  }
}
