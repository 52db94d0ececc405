import type { RegistryService } from './services/RegistryService.js';

let registryService: RegistryService | null = null;

export function setRegistryService(service: RegistryService | null): void {
  registryService = service;
}

/**
 * The service built by the module on load. Commands and listeners only run
 * while the module is loaded, so a missing service is a wiring bug.
 */
export function getRegistryService(): RegistryService {
  if (!registryService) {
    throw new Error('Registry service not initialized');
  }
  return registryService;
}
