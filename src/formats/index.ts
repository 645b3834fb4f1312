/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { GffReader } from '../formats';
 * ```
 */

export { AbstractParser, type ResolvedParserOptions } from "./abstract-parser";
export * from "./gff";
