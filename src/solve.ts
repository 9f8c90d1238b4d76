import { BacktrackingOptions, SolveResult, SolverOptions } from './types';
import { DEFAULT_MAX_TIER } from './defaults';
import { BacktrackingSolver } from './engine/BacktrackingSolver';
import { ProductionRuleSolver } from './engine/ProductionRuleSolver';

/**
 * Solves a puzzle with deduction plus search, and tells unique puzzles from ambiguous ones.
 *
 * Malformed givens are reported as `unsolved` with an empty solution, never thrown.
 *
 * @param givens - Run-length encoded vertex clues.
 * @param width - Number of cell columns.
 * @param height - Number of cell rows.
 * @param maxTier - Highest rule tier to deduce with.
 * @param options - Further solver options; `maxTier` here is overridden by the argument.
 * @throws {ConfigurationError} If an option is out of range, or knownSolution does not fit the board.
 *
 * @example
 * const result = solve('1h', 2, 2);
 * // result.status === 'mult'
 */
export function solve(
    givens: string,
    width: number,
    height: number,
    maxTier: number = DEFAULT_MAX_TIER,
    options: BacktrackingOptions = {},
): SolveResult {
    return new BacktrackingSolver({ ...options, maxTier }).solve(givens, width, height);
}

/**
 * Solves a puzzle by deduction alone. Puzzles that need a guess come back `unsolved`
 * with '.' in every cell the rules could not decide.
 */
export function solveByRules(
    givens: string,
    width: number,
    height: number,
    maxTier: number = DEFAULT_MAX_TIER,
    options: SolverOptions = {},
): SolveResult {
    return new ProductionRuleSolver({ ...options, maxTier }).solve(givens, width, height);
}
