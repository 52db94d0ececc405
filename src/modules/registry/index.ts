/**
 * Registry Module - player registration with channel backups
 */

import { RegistryModule } from './module.js';

export default new RegistryModule();
export { RegistryModule };
