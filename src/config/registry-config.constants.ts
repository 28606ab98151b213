/** Injection token for the frozen RegistryConfig value */
export const REGISTRY_CONFIG = Symbol('REGISTRY_CONFIG');

export const DEFAULT_REGISTRY_CONFIG_PATH = 'config/registry.yaml';
