export { dbPlugin } from './db/index.js';
export { default as storePlugin } from './store-plugin.js';
