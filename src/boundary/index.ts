/**
 * Boundary Module
 *
 * Envelope-returning entry points for embedding in a JavaScript host.
 * None of these functions throw: hosts read `success` and then either
 * `data` or `error`. The optional codec argument defaults to the shared
 * Mina codec.
 */

import { Wallet, parseNetwork, validateAddress as checkAddress } from '../wallet/index.js';
import type { WalletError } from '../wallet/index.js';
import type { KeyCodec } from '../keys/index.js';
import { getKeyCodec } from '../keys/index.js';
import { toWalletData } from '../presentation/index.js';
import {
  type AddressValidation,
  type BoundaryResult,
  type NetworkId,
  type PubKeyComponentsData,
  type Result,
  type WalletData,
  toError,
} from '../utils/types.js';
import { getPackageVersion } from '../utils/version.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('BOUNDARY');

const INVALID_NETWORK = "Invalid network. Use 'mainnet' or 'testnet'.";

function ok<T>(data: T): BoundaryResult<T> {
  return { success: true, data, error: null };
}

function err(error: string): BoundaryResult<never> {
  return { success: false, data: null, error };
}

function withNetwork(
  network: string,
  build: (networkId: NetworkId) => Result<Wallet, WalletError>,
  failurePrefix: string
): BoundaryResult<WalletData> {
  const parsed = parseNetwork(network);
  if (!parsed.ok) {
    return err(INVALID_NETWORK);
  }

  const result = build(parsed.value);
  if (!result.ok) {
    logger.debug(failurePrefix, { kind: result.error.kind });
    return err(`${failurePrefix}: ${result.error.message}`);
  }

  try {
    return ok(toWalletData(result.value));
  } catch (error) {
    return err(`${failurePrefix}: ${toError(error).message}`);
  }
}

/**
 * Generate a new random wallet on "mainnet" or "testnet"
 */
export function generateWallet(
  network: string,
  codec: KeyCodec = getKeyCodec()
): BoundaryResult<WalletData> {
  return withNetwork(network, (id) => Wallet.create(id, codec), 'Failed to generate wallet');
}

/**
 * Import a wallet from a 64-character hex secret key
 */
export function importWalletFromHex(
  secretHex: string,
  network: string,
  codec: KeyCodec = getKeyCodec()
): BoundaryResult<WalletData> {
  return withNetwork(
    network,
    (id) => Wallet.fromSecretKeyHex(secretHex, id, codec),
    'Failed to import wallet'
  );
}

/**
 * Import a wallet from a Base58 secret key
 */
export function importWalletFromBase58(
  secretBase58: string,
  network: string,
  codec: KeyCodec = getKeyCodec()
): BoundaryResult<WalletData> {
  return withNetwork(
    network,
    (id) => Wallet.fromSecretKeyBase58(secretBase58, id, codec),
    'Failed to import wallet'
  );
}

/**
 * Validate an address. The call itself always succeeds; validity is in `data`.
 */
export function validateAddress(
  address: string,
  codec: KeyCodec = getKeyCodec()
): BoundaryResult<AddressValidation> {
  const result = checkAddress(address, codec);
  if (!result.ok) {
    return ok({ valid: false, error: result.error.detail });
  }
  return ok({ valid: true, error: null });
}

/**
 * Public key x-coordinate (hex) and parity carried by an address
 */
export function addressToPubkeyComponents(
  address: string,
  codec: KeyCodec = getKeyCodec()
): BoundaryResult<PubKeyComponentsData> {
  const result = checkAddress(address, codec);
  if (!result.ok) {
    return err(`Invalid address: ${result.error.detail}`);
  }
  return ok({ x: result.value.x, is_odd: result.value.isOdd });
}

export function version(): string {
  return getPackageVersion();
}
