export { InMemoryMetricStore } from './in-memory-metric-store.js';
