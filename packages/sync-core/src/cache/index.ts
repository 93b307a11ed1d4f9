export { createCachedValue, isStale, refreshIfStale, type CachedValue } from './cached-value.js';
