export { AliasIndex, type AliasResolution, type AliasConflict } from './alias-index.js';
