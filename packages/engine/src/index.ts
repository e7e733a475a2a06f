// ---- Solvers ----
export { greedySelect } from './greedy.js';
export { exhaustiveSelect, MAX_EXHAUSTIVE_ITEMS } from './exhaustive.js';

// ---- Dispatch ----
export { solve, compareStrategies } from './solver.js';
export type { SolveConfig, SolveResult, SolveStrategy, StrategyComparison } from './solver.js';
