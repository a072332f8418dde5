export { loadFilteringConfig, DEFAULT_CONFIG } from './filtering-config.js';
export type { FilteringConfig } from './filtering-config.js';
