/**
 * Errors that can occur during wallet operations
 */

export type WalletErrorKind =
  | 'InvalidSecretKey'
  | 'InvalidAddress'
  // Reserved for signing operations
  | 'SigningFailed'
  | 'KeypairGenerationFailed';

const DESCRIPTIONS: Record<WalletErrorKind, string> = {
  InvalidSecretKey: 'Invalid secret key',
  InvalidAddress: 'Invalid address',
  SigningFailed: 'Signing failed',
  KeypairGenerationFailed: 'Keypair generation failed',
};

export class WalletError extends Error {
  readonly kind: WalletErrorKind;
  readonly detail: string;

  constructor(kind: WalletErrorKind, detail: string) {
    super(`${DESCRIPTIONS[kind]}: ${detail}`);
    this.name = 'WalletError';
    this.kind = kind;
    this.detail = detail;
  }

  static invalidSecretKey(detail: string): WalletError {
    return new WalletError('InvalidSecretKey', detail);
  }

  static invalidAddress(detail: string): WalletError {
    return new WalletError('InvalidAddress', detail);
  }

  static keypairGenerationFailed(detail: string): WalletError {
    return new WalletError('KeypairGenerationFailed', detail);
  }
}
