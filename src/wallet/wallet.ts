/**
 * Wallet
 *
 * SECURITY-CRITICAL: this module owns secret keys.
 * - A public key is only ever derived from its secret key
 * - Text, JSON and inspect renderings carry the address and network only
 * - redact() is the single way to obtain a shareable WalletInfo
 */

import type { KeyCodec } from '../keys/index.js';
import { getKeyCodec } from '../keys/index.js';
import {
  type KeyPair,
  type NetworkId,
  type PublicKeyComponents,
  type Result,
  type WalletInfo,
  success,
  failure,
  toError,
  NETWORK_LABELS,
} from '../utils/types.js';
import { createLogger } from '../utils/logger.js';
import { WalletError } from './wallet-error.js';

const logger = createLogger('WALLET');

const INSPECT: unique symbol = Symbol.for('nodejs.util.inspect.custom');

/**
 * Wallet - a keypair bound to a network label
 *
 * Instances are immutable; construct them through the static factories.
 */
export class Wallet {
  private readonly keypair: KeyPair;
  private readonly networkId: NetworkId;
  private readonly codec: KeyCodec;

  private constructor(keypair: KeyPair, network: NetworkId, codec: KeyCodec) {
    this.keypair = keypair;
    this.networkId = network;
    this.codec = codec;
  }

  /**
   * Create a new random wallet
   */
  static create(network: NetworkId, codec: KeyCodec = getKeyCodec()): Result<Wallet, WalletError> {
    let keypair: KeyPair;
    try {
      keypair = codec.generate();
    } catch (error) {
      logger.error('Keypair generation failed', { error: toError(error).message });
      return failure(WalletError.keypairGenerationFailed(toError(error).message));
    }

    logger.debug('Wallet created', { address: keypair.publicKey, network });
    return success(new Wallet(keypair, network, codec));
  }

  /**
   * Import a wallet from a 64-character hex secret key
   */
  static fromSecretKeyHex(
    secretHex: string,
    network: NetworkId,
    codec: KeyCodec = getKeyCodec()
  ): Result<Wallet, WalletError> {
    return Wallet.fromSecret(() => codec.decodeHex(secretHex), network, codec);
  }

  /**
   * Import a wallet from a Base58Check secret key
   */
  static fromSecretKeyBase58(
    secretBase58: string,
    network: NetworkId,
    codec: KeyCodec = getKeyCodec()
  ): Result<Wallet, WalletError> {
    return Wallet.fromSecret(() => codec.decodeBase58(secretBase58), network, codec);
  }

  private static fromSecret(
    decode: () => string,
    network: NetworkId,
    codec: KeyCodec
  ): Result<Wallet, WalletError> {
    let keypair: KeyPair;
    try {
      const privateKey = decode();
      keypair = { privateKey, publicKey: codec.derivePublicKey(privateKey) };
    } catch (error) {
      return failure(WalletError.invalidSecretKey(toError(error).message));
    }

    logger.debug('Wallet imported', { address: keypair.publicKey, network });
    return success(new Wallet(keypair, network, codec));
  }

  address(): string {
    return this.keypair.publicKey;
  }

  publicKey(): PublicKeyComponents {
    return this.codec.parseAddress(this.keypair.publicKey);
  }

  secretKeyHex(): string {
    return this.codec.encodeHex(this.keypair.privateKey);
  }

  secretKeyBase58(): string {
    return this.codec.encodeBase58(this.keypair.privateKey);
  }

  network(): NetworkId {
    return this.networkId;
  }

  /**
   * Project the wallet onto its shareable, secret-free form
   */
  redact(): WalletInfo {
    return { address: this.address(), network: this.networkId };
  }

  toString(): string {
    return this.address();
  }

  toJSON(): WalletInfo {
    return this.redact();
  }

  [INSPECT](): string {
    return `Wallet { address: '${this.address()}', network: ${NETWORK_LABELS[this.networkId]} }`;
  }
}
