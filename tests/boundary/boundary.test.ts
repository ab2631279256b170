import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  addressToPubkeyComponents,
  generateWallet,
  importWalletFromBase58,
  importWalletFromHex,
  validateAddress,
  version,
} from '../../src/boundary/index.js';
import { publicKeyToAddress } from '../../src/wallet/index.js';
import type { BoundaryResult, WalletData } from '../../src/utils/types.js';
import { resetConfig } from '../../src/utils/config.js';
import { ExhaustedEntropyCodec } from '../support/codecs.js';

function dataOf<T>(result: BoundaryResult<T>): T {
  if (!result.success || result.data === null) {
    throw new Error(`expected success, got ${result.error}`);
  }
  return result.data;
}

function generated(network = 'mainnet'): WalletData {
  return dataOf(generateWallet(network));
}

describe('generateWallet', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return wallet data in a success envelope', () => {
    const result = generateWallet('mainnet');

    expect(result.success).toBe(true);
    expect(result.error).toBeNull();
    expect(dataOf(result).address).toMatch(/^B62q/);
  });

  it('should normalize the network name', () => {
    expect(generated('TestNet').network).toBe('testnet');
  });

  it('should reject an unknown network', () => {
    expect(generateWallet('devnet')).toEqual({
      success: false,
      data: null,
      error: "Invalid network. Use 'mainnet' or 'testnet'.",
    });
  });

  it('should report a keypair generation failure', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(generateWallet('mainnet', new ExhaustedEntropyCodec())).toEqual({
      success: false,
      data: null,
      error: 'Failed to generate wallet: Keypair generation failed: entropy source exhausted',
    });
  });
});

describe('with an invalid LOG_LEVEL', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('should still return envelopes', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    resetConfig();

    expect(generateWallet('mainnet').success).toBe(true);
    expect(importWalletFromHex(`${'0'.repeat(63)}1`, 'mainnet').success).toBe(true);
    expect(importWalletFromHex('abc', 'mainnet').error).toBe(
      'Failed to import wallet: Invalid secret key: secret key hex must be exactly 64 hexadecimal characters'
    );
  });
});

describe('importWalletFromHex', () => {
  it('should import exported hex', () => {
    const wallet = generated();

    expect(dataOf(importWalletFromHex(wallet.secret_key_hex, 'mainnet'))).toEqual(wallet);
  });

  it('should report invalid hex', () => {
    expect(importWalletFromHex('abc', 'mainnet')).toEqual({
      success: false,
      data: null,
      error:
        'Failed to import wallet: Invalid secret key: secret key hex must be exactly 64 hexadecimal characters',
    });
  });

  it('should check the network before the key', () => {
    expect(importWalletFromHex('abc', 'devnet').error).toBe(
      "Invalid network. Use 'mainnet' or 'testnet'."
    );
  });
});

describe('importWalletFromBase58', () => {
  it('should import exported base58 on another network', () => {
    const wallet = generated('mainnet');
    const imported = dataOf(importWalletFromBase58(wallet.secret_key_base58, 'testnet'));

    expect(imported).toEqual({ ...wallet, network: 'testnet' });
  });

  it('should reject hex input', () => {
    const wallet = generated();
    const result = importWalletFromBase58(wallet.secret_key_hex, 'mainnet');

    expect(result.success).toBe(false);
    expect(result.data).toBeNull();
    expect(result.error).toMatch(/^Failed to import wallet: Invalid secret key: /);
  });
});

describe('validateAddress', () => {
  it('should report a valid address', () => {
    const wallet = generated();

    expect(validateAddress(wallet.address)).toEqual({
      success: true,
      data: { valid: true, error: null },
      error: null,
    });
  });

  it('should report an invalid address inside a successful call', () => {
    const result = validateAddress('B62qnot-an-address');
    const data = dataOf(result);

    expect(data.valid).toBe(false);
    expect(data.error).toMatch(/^address is not valid base58check/);
  });
});

describe('addressToPubkeyComponents', () => {
  it('should expose the x-coordinate and parity', () => {
    const wallet = generated();
    const components = dataOf(addressToPubkeyComponents(wallet.address));

    expect(components.x).toMatch(/^[0-9a-f]{64}$/);
    expect(publicKeyToAddress({ x: components.x, isOdd: components.is_odd })).toEqual({
      ok: true,
      value: wallet.address,
    });
  });

  it('should fail for an invalid address', () => {
    const result = addressToPubkeyComponents('not-an-address');

    expect(result.success).toBe(false);
    expect(result.data).toBeNull();
    expect(result.error).toMatch(/^Invalid address: /);
  });
});

describe('version', () => {
  it('should return the package version', () => {
    expect(version()).toBe('0.1.0');
  });
});
