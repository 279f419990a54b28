/**
 * clarion
 *
 * Interview-driven document synthesis: a seed (a short description or an
 * earlier document) goes in, rounds of clarifying questions come out, and a
 * fully specified Markdown document is written once every applicable field
 * has an answer.
 *
 * @example
 * ```typescript
 * import { DocumentSynthesizer, createSeed, loadTemplate, runSession } from 'clarion';
 *
 * const synthesizer = new DocumentSynthesizer({ template: await loadTemplate() });
 * const result = await runSession(synthesizer, createSeed('description', 'nightly cleanup job'), {
 *   answerer: myAnswerer,
 * });
 * ```
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './template/index.js';
export * from './synthesis/index.js';
export * from './config/index.js';
export { Logger, silentLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LogSink, LoggerOptions } from './utils/logger.js';
