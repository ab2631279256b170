/**
 * Wallet renderers for CLI output
 *
 * Renderers only format what the wallet already exposes; nothing is derived here.
 */

import type { Wallet } from '../wallet/index.js';
import { type OutputFormat, type WalletData, NETWORK_LABELS } from '../utils/types.js';

export const SECRET_KEY_WARNING =
  'WARNING: Store your secret key securely! Anyone with access to it can control your funds.';

/**
 * Map an output-format selector to a format.
 * Unrecognized selectors fall back to text.
 */
export function parseOutputFormat(selector: string): OutputFormat {
  return selector === 'json' ? 'json' : 'text';
}

export function toWalletData(wallet: Wallet): WalletData {
  return {
    address: wallet.address(),
    secret_key_hex: wallet.secretKeyHex(),
    secret_key_base58: wallet.secretKeyBase58(),
    network: wallet.network(),
  };
}

export function renderWalletText(wallet: Wallet): string {
  const heading = 'Wallet Generated Successfully!';
  return [
    heading,
    '='.repeat(heading.length),
    `Address:          ${wallet.address()}`,
    `Secret Key (Hex): ${wallet.secretKeyHex()}`,
    `Secret Key (B58): ${wallet.secretKeyBase58()}`,
    `Network:          ${NETWORK_LABELS[wallet.network()]}`,
    '',
    SECRET_KEY_WARNING,
  ].join('\n');
}

export function renderWalletJson(wallet: Wallet): string {
  return JSON.stringify(toWalletData(wallet), null, 2);
}

export function renderWallet(wallet: Wallet, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return renderWalletJson(wallet);
    case 'text':
      return renderWalletText(wallet);
  }
}
