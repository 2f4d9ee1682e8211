export { GoDaddyProvider, type GoDaddyProviderOptions } from './GoDaddyProvider.js';
