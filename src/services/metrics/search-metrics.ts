import { Counter, Histogram } from 'prom-client';
import { register } from './registry.js';

export const searchRequests = new Counter({
  name: 'kbase_search_requests_total',
  help: 'Total number of search requests',
  labelNames: ['mode', 'status'],
  registers: [register]
});

export const searchStrategyOutcomes = new Counter({
  name: 'kbase_search_strategy_total',
  help: 'Vector similarity strategy attempts by outcome',
  labelNames: ['strategy', 'outcome'],
  registers: [register]
});

export const searchResultCount = new Histogram({
  name: 'kbase_search_results',
  help: 'Number of results returned per search',
  labelNames: ['mode'],
  buckets: [0, 1, 2, 5, 10, 20, 50],
  registers: [register]
});
