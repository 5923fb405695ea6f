export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
