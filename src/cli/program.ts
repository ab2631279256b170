/**
 * mina-wallet command-line program
 *
 * Output discipline:
 * - command output goes to stdout, nothing else does
 * - every failure is one line on stderr and exit code 1
 */

import { Command, CommanderError } from '@commander-js/extra-typings';
import {
  Wallet,
  importWallet,
  parseNetwork,
  validateAddress,
} from '../wallet/index.js';
import { parseOutputFormat, renderWallet } from '../presentation/index.js';
import type { KeyCodec } from '../keys/index.js';
import { getKeyCodec } from '../keys/index.js';
import type { NetworkId } from '../utils/types.js';
import { toError } from '../utils/types.js';
import { getPackageVersion } from '../utils/version.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('CLI');

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

interface CommandContext {
  print(line: string): void;
  fail(line: string): void;
}

const DEFAULT_NETWORK = 'mainnet';
const DEFAULT_FORMAT = 'text';

function withNetwork(ctx: CommandContext, network: string, run: (networkId: NetworkId) => void): void {
  const parsed = parseNetwork(network);
  if (!parsed.ok) {
    ctx.fail(`Error: ${parsed.error.message}`);
    return;
  }
  run(parsed.value);
}

function buildProgram(io: CliIo, ctx: CommandContext, codec: KeyCodec): Command {
  const program = new Command()
    .name('mina-wallet')
    .description('Mina wallet CLI tool')
    .version(getPackageVersion())
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
      outputError: (text, write) => write(text.replace(/^error: /, 'Error: ')),
    });

  program
    .command('generate')
    .description('Generate a new random wallet')
    .option('-n, --network <network>', 'Network: mainnet or testnet', DEFAULT_NETWORK)
    .option('-f, --format <format>', 'Output format: text or json', DEFAULT_FORMAT)
    .action(({ network, format }) => {
      withNetwork(ctx, network, (networkId) => {
        const result = Wallet.create(networkId, codec);
        if (!result.ok) {
          ctx.fail(`Error: ${result.error.message}`);
          return;
        }
        ctx.print(renderWallet(result.value, parseOutputFormat(format)));
      });
    });

  program
    .command('import')
    .description('Import a wallet from a secret key')
    .argument('<secret_key>', 'Secret key in hex or base58 format')
    .option('-n, --network <network>', 'Network: mainnet or testnet', DEFAULT_NETWORK)
    .option('-f, --format <format>', 'Output format: text or json', DEFAULT_FORMAT)
    .action((secretKey, { network, format }) => {
      withNetwork(ctx, network, (networkId) => {
        const result = importWallet(secretKey, networkId, codec);
        if (!result.ok) {
          ctx.fail(`Error: ${result.error.detail}`);
          return;
        }
        ctx.print(renderWallet(result.value, parseOutputFormat(format)));
      });
    });

  program
    .command('validate')
    .description('Validate a Mina address')
    .argument('<address>', 'The Mina address to validate')
    .action((address) => {
      const result = validateAddress(address, codec);
      if (!result.ok) {
        logger.debug('Address rejected', { reason: result.error.detail });
        ctx.fail(`Invalid address: ${result.error.detail}`);
        return;
      }
      ctx.print(`Address is valid: ${address}`);
    });

  program
    .command('address')
    .description('Get address from a secret key (without showing the secret)')
    .argument('<secret_key>', 'Secret key in hex or base58 format')
    .action((secretKey) => {
      // Addresses do not depend on the network
      const result = importWallet(secretKey, 'mainnet', codec);
      if (!result.ok) {
        ctx.fail(`Error: ${result.error.detail}`);
        return;
      }
      ctx.print(result.value.address());
    });

  return program;
}

/**
 * Run the program against user arguments (without node and script path)
 * and return the process exit code
 */
export function runCli(
  argv: readonly string[],
  io: CliIo = processIo,
  codec: KeyCodec = getKeyCodec()
): number {
  let exitCode = 0;

  const ctx: CommandContext = {
    print: (line) => io.stdout(`${line}\n`),
    fail: (line) => {
      io.stderr(`${line.replace(/\s*\n\s*/g, ' ')}\n`);
      exitCode = 1;
    },
  };

  try {
    buildProgram(io, ctx, codec).parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    ctx.fail(`Error: ${toError(error).message}`);
  }

  return exitCode;
}
