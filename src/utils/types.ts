/**
 * Core Type Definitions for the Mina Wallet Toolkit
 *
 * These types define the boundaries between the key codec, the wallet
 * layer and the presentation/boundary surfaces.
 * Secret keys are NEVER part of the "safe" shapes in this file.
 */

// ============================================
// NETWORK TYPES
// ============================================

export const NETWORK_IDS = ['mainnet', 'testnet'] as const;

export type NetworkId = (typeof NETWORK_IDS)[number];

export const NETWORK_LABELS: Record<NetworkId, string> = {
  mainnet: 'Mainnet',
  testnet: 'Testnet',
};

// ============================================
// KEY TYPES
// ============================================

/**
 * Keypair in the signing library's native encoding:
 * Base58Check secret key and B62 address.
 */
export interface KeyPair {
  readonly privateKey: string;
  readonly publicKey: string;
}

/**
 * Compressed public key as carried inside an address
 */
export interface PublicKeyComponents {
  /** x-coordinate, 32 little-endian bytes as hex */
  readonly x: string;
  readonly isOdd: boolean;
}

// ============================================
// WALLET LAYER TYPES
// ============================================

/**
 * Public wallet information - safe to expose
 */
export interface WalletInfo {
  readonly address: string;
  readonly network: NetworkId;
}

/**
 * Full wallet export, including both secret key encodings.
 * Field names follow the JSON output format.
 */
export interface WalletData {
  readonly address: string;
  readonly secret_key_hex: string;
  readonly secret_key_base58: string;
  readonly network: NetworkId;
}

export type OutputFormat = 'text' | 'json';

// ============================================
// BOUNDARY TYPES
// ============================================

/**
 * Envelope returned by every boundary call. Hosts check `success`
 * before reading `data`.
 */
export interface BoundaryResult<T> {
  readonly success: boolean;
  readonly data: T | null;
  readonly error: string | null;
}

export interface AddressValidation {
  readonly valid: boolean;
  readonly error: string | null;
}

export interface PubKeyComponentsData {
  readonly x: string;
  readonly is_odd: boolean;
}

// ============================================
// RESULT TYPES
// ============================================

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function success<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function failure<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Normalize an unknown throwable into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
