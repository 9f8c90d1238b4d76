import type { Board } from './engine/Board';
import type { LoopFormedError } from './errors';

/**
 * The content of a single grid cell.
 */
export enum CellValue {
    /** Not yet decided. */
    UNKNOWN,
    /** `/` connects the cell's bottom-left vertex to its top-right vertex. */
    SLASH,
    /** `\` connects the cell's top-left vertex to its bottom-right vertex. */
    BACKSLASH,
}

/**
 * A vertex clue (0-4), or null for a vertex without a constraint.
 */
export type Clue = number | null;

/**
 * Outcome of a solve.
 */
export enum SolveStatus {
    /** Exactly one solution was found. */
    SOLVED = 'solved',
    /** No solution was found (or the solver could not finish deducing one). */
    UNSOLVED = 'unsolved',
    /** At least two distinct solutions exist. */
    MULTIPLE = 'mult',
}

/**
 * Human-difficulty classification of a deduction rule.
 * 1 is obvious, 2 needs more insight, 3 needs lookahead or search.
 */
export type RuleTier = 1 | 2 | 3;

/**
 * A single deduction rule. `apply` inspects the board, may place values or merge
 * equivalence classes, and returns true only if it changed something.
 */
export interface Rule {
    /** Stable identifier used in traces and firing counts (e.g. 'no_loops'). */
    name: string;
    /** Work score charged each time the rule makes progress. */
    score: number;
    tier: RuleTier;
    apply: (board: Board) => boolean;
}

/**
 * The result of solving a puzzle.
 */
export interface SolveResult {
    status: SolveStatus;
    /**
     * One character per cell in row-major order: '/', '\' or '.' for an undecided cell.
     * Empty when the puzzle could not be constructed.
     */
    solution: string;
    /** Sum of the scores of every rule firing, plus the search penalty for backtracking. */
    workScore: number;
    /** Highest tier of any rule that made progress; 3 whenever search had to branch. */
    maxTierUsed: number;
}

/**
 * A cell adjacent to a vertex, together with the orientation that would touch that vertex.
 */
export interface AdjacentCell {
    x: number;
    y: number;
    /** SLASH or BACKSLASH: the value this cell needs to touch the vertex. */
    touching: CellValue;
}

/**
 * A vertex that carries a clue.
 */
export interface CluedVertex {
    vx: number;
    vy: number;
    clue: number;
}

/**
 * Outcome of Board.placeValue.
 * `changed` is false when the cell already held a value (the call is a no-op).
 */
export type PlacementResult =
    | { ok: true; changed: boolean }
    | { ok: false; error: LoopFormedError };

/**
 * Options shared by both solvers.
 */
export interface SolverOptions {
    /**
     * Highest rule tier the solver may use.
     * Default: 10 (every rule).
     */
    maxTier?: number;
    /**
     * The ordered rule list. Defaults to DEFAULT_RULES.
     * Rules are tried in the given order, so the list should be sorted cheapest first.
     */
    rules?: readonly Rule[];
    /**
     * Safety cap on rule firings per fixpoint run.
     * Default: max(1000, 8 * number of cells).
     */
    maxIterations?: number;
    /**
     * A recorded answer. Any rule that places a value contradicting it stops the solve.
     * Used for differential testing of the rule list.
     */
    knownSolution?: string;
    /**
     * Callback for trace logs of execution details.
     */
    onTrace?: (message: string) => void;
}

/**
 * Options for the backtracking solver.
 */
export interface BacktrackingOptions extends SolverOptions {
    /**
     * Maximum number of search frames to pop before giving up.
     * Default: Infinity.
     */
    maxFrames?: number;
}
