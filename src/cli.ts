#!/usr/bin/env node
/**
 * mina-wallet - Command-line entry point
 */

import { runCli } from './cli/program.js';

process.exitCode = runCli(process.argv.slice(2));
