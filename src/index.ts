export * from './types';
export * from './engine/Givens';
export * from './engine/Board';
export * from './engine/Rules';
export * from './engine/RuleEngine';
export { ProductionRuleSolver } from './engine/ProductionRuleSolver';
export * from './engine/BacktrackingSolver';
export * from './solve';
export * from './defaults';
export * from './errors';
