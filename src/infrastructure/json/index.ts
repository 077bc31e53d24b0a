export { TokenCursor } from './token-cursor.js';
export type { TokenKind } from './token-cursor.js';
export { StringCharSource, FileCharSource, DEFAULT_CHUNK_SIZE } from './char-source.js';
export type { CharSource } from './char-source.js';
