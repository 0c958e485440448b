/**
 * DocFusion Performance
 */

export { WorkerPool } from './worker-pool.js';
export type { RunOptions } from './worker-pool.js';
