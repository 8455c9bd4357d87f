export { ResultCache, CacheConfig, CacheEntry } from './ResultCache';
