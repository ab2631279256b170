/**
 * Mina Wallet Toolkit - Library Entry Point
 *
 * Wallet creation and import for the Mina protocol, plus the
 * envelope-style boundary functions for embedding in a host application.
 */

export * from './utils/types.js';

export {
  Wallet,
  WalletError,
  validateAddress as checkAddress,
  addressToPublicKey,
  publicKeyToAddress,
  importWallet,
  firstSuccess,
  parseNetwork,
  INVALID_SECRET_KEY_FORMAT,
} from './wallet/index.js';
export type { WalletErrorKind, ImportAttempt } from './wallet/index.js';

export { MinaKeyCodec, KeyCodecError, getKeyCodec } from './keys/index.js';
export type { KeyCodec } from './keys/index.js';

export {
  SECRET_KEY_WARNING,
  parseOutputFormat,
  toWalletData,
  renderWalletText,
  renderWalletJson,
  renderWallet,
} from './presentation/index.js';

export {
  generateWallet,
  importWalletFromHex,
  importWalletFromBase58,
  validateAddress,
  addressToPubkeyComponents,
  version,
} from './boundary/index.js';
