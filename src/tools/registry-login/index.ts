export { checkRegistryLogin, loginHint, type RegistryLoginResult } from './tool.js';
export { registryLoginSchema, type RegistryLoginParams } from './schema.js';
