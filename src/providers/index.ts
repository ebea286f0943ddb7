export { ProviderRegistry, ProviderNotRegisteredError } from './registry.js';
