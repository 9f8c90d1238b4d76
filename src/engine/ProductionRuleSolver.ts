import { Rule, SolveResult, SolveStatus, SolverOptions } from '../types';
import { ConfigurationError, MalformedGivensError } from '../errors';
import { DEFAULT_MAX_TIER } from '../defaults';
import { Board } from './Board';
import { RuleEngine } from './RuleEngine';
import { DEFAULT_RULES } from './Rules';

/**
 * Checks solver options shared by both solvers, throwing on values no solve could use.
 *
 * @throws {ConfigurationError}
 */
export function validateSolverOptions(options: SolverOptions): void {
    const { maxTier, maxIterations } = options;
    if (maxTier !== undefined && (!Number.isInteger(maxTier) || maxTier < 1)) {
        throw new ConfigurationError(`maxTier must be a positive integer, got ${maxTier}.`);
    }
    if (maxIterations !== undefined && (!Number.isInteger(maxIterations) || maxIterations < 1)) {
        throw new ConfigurationError(`maxIterations must be a positive integer, got ${maxIterations}.`);
    }
}

/**
 * Builds a board, folding bad puzzle input (dimensions or givens) into null after tracing it.
 * A known answer that does not fit the board is a caller error and is thrown.
 *
 * @throws {ConfigurationError} If knownSolution does not have one character per cell.
 */
export function createBoard(
    givens: string,
    width: number,
    height: number,
    knownSolution: string | undefined,
    onTrace: ((message: string) => void) | undefined,
): Board | null {
    let board: Board;
    try {
        board = new Board(width, height, givens);
    } catch (e) {
        if (e instanceof MalformedGivensError || e instanceof ConfigurationError) {
            if (onTrace) onTrace(`Cannot build a ${width}x${height} board: ${e.message}`);
            return null;
        }
        throw e;
    }

    if (knownSolution !== undefined) board.setKnownSolution(knownSolution);
    return board;
}

/**
 * The result reported for a puzzle that could not be turned into a board.
 */
export function unbuildableResult(): SolveResult {
    return { status: SolveStatus.UNSOLVED, solution: '', workScore: 0, maxTierUsed: 0 };
}

/**
 * Solves by deduction alone: the rule engine runs once to its fixpoint, with no guessing.
 * A puzzle the rules cannot finish is reported as unsolved, with the undecided cells as '.'.
 */
export class ProductionRuleSolver {
    private readonly rules: readonly Rule[];
    private readonly maxTier: number;
    private readonly options: SolverOptions;

    /**
     * @param options - Tier limit, rule list, iteration cap, known answer and trace hook.
     * @throws {ConfigurationError} If maxTier or maxIterations is not a positive integer.
     */
    constructor(options: SolverOptions = {}) {
        validateSolverOptions(options);
        const { maxTier = DEFAULT_MAX_TIER, rules = DEFAULT_RULES } = options;
        this.maxTier = maxTier;
        this.rules = rules;
        this.options = options;
    }

    /**
     * Solves one puzzle.
     *
     * @param givens - Run-length encoded vertex clues.
     * @param width - Number of cell columns.
     * @param height - Number of cell rows.
     * @throws {ConfigurationError} If options.knownSolution does not fit the board.
     */
    public solve(givens: string, width: number, height: number): SolveResult {
        const { onTrace, knownSolution, maxIterations } = this.options;

        const board = createBoard(givens, width, height, knownSolution, onTrace);
        if (!board) return unbuildableResult();

        const engine = new RuleEngine(this.rules, this.maxTier, { maxIterations, onTrace });
        const run = engine.run(board);

        if (board.hasConflict() && onTrace) {
            onTrace('Deduction conflict: cells deduced equivalent hold different orientations');
        }

        const solved = run.mismatch === undefined
            && !board.hasConflict()
            && board.isValid()
            && board.isValidSolution();

        return {
            status: solved ? SolveStatus.SOLVED : SolveStatus.UNSOLVED,
            solution: board.toSolutionString(),
            workScore: run.workScore,
            maxTierUsed: run.maxTierUsed,
        };
    }
}
