/**
 * Wallet Module Exports
 *
 * Secret keys leave this module only through the explicit
 * secretKeyHex() / secretKeyBase58() exporters.
 */

export { Wallet } from './wallet.js';
export { WalletError } from './wallet-error.js';
export type { WalletErrorKind } from './wallet-error.js';
export { validateAddress, addressToPublicKey, publicKeyToAddress } from './address.js';
export { importWallet, firstSuccess, INVALID_SECRET_KEY_FORMAT } from './import.js';
export type { ImportAttempt } from './import.js';
export { parseNetwork } from './network.js';
