import { z } from 'zod';
import { type NetworkId, type Result, NETWORK_IDS, success, failure } from '../utils/types.js';

const NetworkSchema = z
  .string()
  .toLowerCase()
  .pipe(z.enum(NETWORK_IDS));

/**
 * Parse a user-supplied network name, ignoring case
 */
export function parseNetwork(input: string): Result<NetworkId, Error> {
  const result = NetworkSchema.safeParse(input);
  if (!result.success) {
    return failure(new Error(`Invalid network '${input}'. Use 'mainnet' or 'testnet'.`));
  }
  return success(result.data);
}
