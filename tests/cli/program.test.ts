import { afterEach, describe, it, expect, vi } from 'vitest';
import { runCli, type CliIo } from '../../src/cli/program.js';
import { Wallet } from '../../src/wallet/index.js';
import { SECRET_KEY_WARNING } from '../../src/presentation/index.js';
import type { KeyCodec } from '../../src/keys/index.js';
import { ExhaustedEntropyCodec } from '../support/codecs.js';

interface CliRun {
  code: number;
  stdout: string;
  stderr: string;
}

function runWith(codec: KeyCodec | undefined, argv: string[]): CliRun {
  let stdout = '';
  let stderr = '';
  const io: CliIo = {
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
  };

  const code = runCli(argv, io, codec);
  return { code, stdout, stderr };
}

function run(...argv: string[]): CliRun {
  return runWith(undefined, argv);
}

function newWallet(): Wallet {
  const result = Wallet.create('mainnet');
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

describe('mina-wallet generate', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print a text report by default', () => {
    const { code, stdout, stderr } = run('generate');
    const lines = stdout.trimEnd().split('\n');

    expect(code).toBe(0);
    expect(stderr).toBe('');
    expect(lines[0]).toBe('Wallet Generated Successfully!');
    expect(lines[2]).toMatch(/^Address: {10}B62q/);
    expect(lines[5]).toBe('Network:          Mainnet');
    expect(lines[7]).toBe(SECRET_KEY_WARNING);
  });

  it('should print json with a lower-case network regardless of input case', () => {
    const { code, stdout } = run('generate', '--network', 'TestNet', '--format', 'json');
    const data: unknown = JSON.parse(stdout);

    expect(code).toBe(0);
    expect(data).toMatchObject({ network: 'testnet' });
  });

  it('should accept short options', () => {
    const { code, stdout } = run('generate', '-n', 'testnet', '-f', 'json');

    expect(code).toBe(0);
    expect(JSON.parse(stdout)).toMatchObject({ network: 'testnet' });
  });

  it('should fall back to text for an unknown format', () => {
    const { code, stdout } = run('generate', '--format', 'yaml');

    expect(code).toBe(0);
    expect(stdout.split('\n')[0]).toBe('Wallet Generated Successfully!');
  });

  it('should reject an unknown network', () => {
    const { code, stdout, stderr } = run('generate', '--network', 'devnet');

    expect(code).toBe(1);
    expect(stdout).toBe('');
    expect(stderr).toBe("Error: Invalid network 'devnet'. Use 'mainnet' or 'testnet'.\n");
  });

  it('should exit 1 with one error line when keypair generation fails', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { code, stdout, stderr } = runWith(new ExhaustedEntropyCodec(), ['generate']);

    expect(code).toBe(1);
    expect(stdout).toBe('');
    expect(stderr).toBe('Error: Keypair generation failed: entropy source exhausted\n');
  });
});

describe('mina-wallet import', () => {
  it('should import a hex secret key', () => {
    const wallet = newWallet();
    const { code, stdout } = run('import', wallet.secretKeyHex(), '--format', 'json');

    expect(code).toBe(0);
    expect(JSON.parse(stdout)).toEqual({
      address: wallet.address(),
      secret_key_hex: wallet.secretKeyHex(),
      secret_key_base58: wallet.secretKeyBase58(),
      network: 'mainnet',
    });
  });

  it('should import a base58 secret key', () => {
    const wallet = newWallet();
    const { code, stdout } = run('import', wallet.secretKeyBase58(), '-n', 'testnet');
    const lines = stdout.split('\n');

    expect(code).toBe(0);
    expect(lines[2]).toBe(`Address:          ${wallet.address()}`);
    expect(lines[3]).toBe(`Secret Key (Hex): ${wallet.secretKeyHex()}`);
    expect(lines[5]).toBe('Network:          Testnet');
  });

  it('should fail with the combined format message', () => {
    const { code, stdout, stderr } = run('import', 'not-a-key');

    expect(code).toBe(1);
    expect(stdout).toBe('');
    expect(stderr).toBe(
      'Error: Invalid secret key format. Expected hex (64 chars) or base58 (52 chars).\n'
    );
  });

  it('should require a secret key argument', () => {
    const { code, stdout, stderr } = run('import');

    expect(code).toBe(1);
    expect(stdout).toBe('');
    expect(stderr).toBe("Error: missing required argument 'secret_key'\n");
  });
});

describe('mina-wallet validate', () => {
  it('should confirm a valid address', () => {
    const wallet = newWallet();
    const { code, stdout, stderr } = run('validate', wallet.address());

    expect(code).toBe(0);
    expect(stdout).toBe(`Address is valid: ${wallet.address()}\n`);
    expect(stderr).toBe('');
  });

  it('should reject an invalid address on one line', () => {
    const { code, stdout, stderr } = run('validate', 'B62qinvalid');

    expect(code).toBe(1);
    expect(stdout).toBe('');
    expect(stderr).toMatch(/^Invalid address: [^\n]+\n$/);
  });
});

describe('mina-wallet address', () => {
  it('should print only the address', () => {
    const wallet = newWallet();
    const { code, stdout } = run('address', wallet.secretKeyBase58());

    expect(code).toBe(0);
    expect(stdout).toBe(`${wallet.address()}\n`);
  });

  it('should fail on an invalid key without writing to stdout', () => {
    const { code, stdout, stderr } = run('address', 'not-a-key');

    expect(code).toBe(1);
    expect(stdout).toBe('');
    expect(stderr).toBe(
      'Error: Invalid secret key format. Expected hex (64 chars) or base58 (52 chars).\n'
    );
  });
});

describe('mina-wallet', () => {
  it('should print the version', () => {
    const { code, stdout } = run('--version');

    expect(code).toBe(0);
    expect(stdout).toBe('0.1.0\n');
  });

  it('should fail on an unknown command', () => {
    const { code, stdout, stderr } = run('sign');

    expect(code).toBe(1);
    expect(stdout).toBe('');
    expect(stderr).toMatch(/^Error: unknown command 'sign'/);
  });
});
