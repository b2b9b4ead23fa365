/**
 * Core Ports
 *
 * The boundary between core logic and user-facing output.
 */

export type { OutputPort } from './output.js';
export { consoleOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';
