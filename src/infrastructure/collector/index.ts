export { default as collectorPlugin } from './collector-plugin.js';
export type { CollectorPluginOptions, Collector } from './collector-plugin.js';
