/**
 * Composition root exports
 */

export { createContainer } from './container.js';
export type { Deps, DepsOverrides } from './container.js';
