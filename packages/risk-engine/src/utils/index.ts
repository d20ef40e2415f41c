export { canonicalJson, sha256Hex } from './canonical.js';
export { deepFreeze } from './freeze.js';
