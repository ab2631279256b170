/**
 * Key Codec Module Exports
 */

export { MinaKeyCodec, KeyCodecError, getKeyCodec } from './mina-codec.js';
export type { KeyCodec } from './mina-codec.js';
