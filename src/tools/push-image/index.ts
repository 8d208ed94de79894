export { pushImage, type PushImageResult } from './tool.js';
export { pushImageSchema, type PushImageParams } from './schema.js';
