/**
 * Tier limit that admits every rule.
 */
export const DEFAULT_MAX_TIER = 10;

/**
 * Highest rule tier the backtracking solver runs between branches.
 * Tier 3 rules are one-step lookahead, which the search itself already covers.
 */
export const SEARCH_RULE_TIER = 2;

/**
 * Tier reported for any solve that had to branch.
 */
export const BRANCH_TIER = 3;

/**
 * Work score charged for every frame pushed to or popped from the search stack.
 */
export const PUSH_POP_SCORE = 2;

/**
 * Lower bound of the default per-run iteration cap of the rule engine.
 */
export const MIN_ENGINE_ITERATIONS = 1000;

/**
 * Default iteration cap for a board with the given number of cells.
 */
export function defaultMaxIterations(cellCount: number): number {
    return Math.max(MIN_ENGINE_ITERATIONS, 8 * cellCount);
}
