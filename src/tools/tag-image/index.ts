export { tagImage, type TagImageResult } from './tool.js';
export { tagImageSchema, type TagImageParams } from './schema.js';
