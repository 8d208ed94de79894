/**
 * Build Image Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { buildImage, buildArgList, formatBuildDate, resolveBuildRef } from './tool.js';
export { buildImageSchema, type BuildImageParams } from './schema.js';
export type { BuildImageResult } from './tool.js';
