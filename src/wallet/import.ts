/**
 * Secret key format auto-detection
 */

import type { KeyCodec } from '../keys/index.js';
import { getKeyCodec } from '../keys/index.js';
import type { NetworkId, Result } from '../utils/types.js';
import { failure } from '../utils/types.js';
import { createLogger } from '../utils/logger.js';
import { Wallet } from './wallet.js';
import { WalletError } from './wallet-error.js';

const logger = createLogger('IMPORT');

export const INVALID_SECRET_KEY_FORMAT =
  'Invalid secret key format. Expected hex (64 chars) or base58 (52 chars).';

export interface ImportAttempt<T, E> {
  readonly format: string;
  readonly attempt: () => Result<T, E>;
}

/**
 * Run attempts in order and return the first success.
 * When every attempt fails, the result of `onExhausted` is returned.
 */
export function firstSuccess<T, E>(
  attempts: readonly ImportAttempt<T, E>[],
  onExhausted: (errors: readonly E[]) => E
): Result<T, E> {
  const errors: E[] = [];

  for (const { format, attempt } of attempts) {
    const result = attempt();
    if (result.ok) {
      return result;
    }
    logger.debug('Import attempt rejected', { format });
    errors.push(result.error);
  }

  return failure(onExhausted(errors));
}

/**
 * Import a wallet from a secret key in either supported encoding:
 * hex first, then Base58
 */
export function importWallet(
  secretKey: string,
  network: NetworkId,
  codec: KeyCodec = getKeyCodec()
): Result<Wallet, WalletError> {
  return firstSuccess<Wallet, WalletError>(
    [
      { format: 'hex', attempt: () => Wallet.fromSecretKeyHex(secretKey, network, codec) },
      { format: 'base58', attempt: () => Wallet.fromSecretKeyBase58(secretKey, network, codec) },
    ],
    () => WalletError.invalidSecretKey(INVALID_SECRET_KEY_FORMAT)
  );
}
