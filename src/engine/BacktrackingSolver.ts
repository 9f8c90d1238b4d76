import { BacktrackingOptions, CellValue, Rule, SolveResult, SolveStatus } from '../types';
import { ConfigurationError } from '../errors';
import { BRANCH_TIER, DEFAULT_MAX_TIER, PUSH_POP_SCORE, SEARCH_RULE_TIER } from '../defaults';
import { Board, BoardState } from './Board';
import { RuleEngine } from './RuleEngine';
import { DEFAULT_RULES } from './Rules';
import { createBoard, unbuildableResult, validateSolverOptions } from './ProductionRuleSolver';

/**
 * A pending branch of the search: a board snapshot with one more cell decided.
 */
interface SearchFrame {
    state: BoardState;
    depth: number;
    /** The guess that produced this frame; absent for the root. */
    branch?: { x: number; y: number; value: CellValue };
}

/**
 * Scores an undecided cell by how constrained its clued corners are.
 * A corner that is exactly full, or needs every remaining slot, scores 100;
 * otherwise 50 is split over its open slots.
 */
export function scoreCell(board: Board, x: number, y: number): number {
    let score = 0;
    for (const [vx, vy] of [[x, y], [x + 1, y], [x, y + 1], [x + 1, y + 1]]) {
        const clue = board.getClue(vx, vy);
        if (clue === null) continue;
        const { touches, unknown } = board.countTouches(vx, vy);
        const needed = clue - touches;
        if (needed === unknown || needed === 0) {
            score += 100;
        } else if (unknown > 0) {
            score += Math.floor(50 / unknown);
        }
    }
    return score;
}

/**
 * Picks the cell to branch on: the highest scoring one, the first in row-major order on ties.
 */
export function pickBranchCell(board: Board): { x: number; y: number } | null {
    let best: { x: number; y: number } | null = null;
    let bestScore = -1;
    for (const cell of board.getUnknownCells()) {
        const score = scoreCell(board, cell.x, cell.y);
        if (score > bestScore) {
            best = cell;
            bestScore = score;
        }
    }
    return best;
}

/**
 * Lists the orientations worth trying in a cell, most promising first.
 * An orientation is dropped if it closes a loop or touches a clue that is already full;
 * each clued corner it touches raises its priority.
 */
export function candidateValues(board: Board, x: number, y: number): CellValue[] {
    const candidates: Array<{ value: CellValue; priority: number }> = [];
    for (const value of [CellValue.SLASH, CellValue.BACKSLASH]) {
        if (board.wouldFormLoop(x, y, value)) continue;

        const touched = value === CellValue.SLASH
            ? [[x + 1, y], [x, y + 1]]
            : [[x, y], [x + 1, y + 1]];

        let priority = 0;
        let allowed = true;
        for (const [vx, vy] of touched) {
            const clue = board.getClue(vx, vy);
            if (clue === null) continue;
            if (board.countTouches(vx, vy).touches >= clue) {
                allowed = false;
                break;
            }
            priority += 10;
        }

        if (allowed) candidates.push({ value, priority });
    }

    // Array.prototype.sort is stable, so equal priorities keep SLASH first.
    return candidates.sort((a, b) => b.priority - a.priority).map(c => c.value);
}

/**
 * Solves by deduction plus depth-first search.
 *
 * Each popped frame runs the rule engine to its fixpoint; a frame that stalls branches on the
 * most constrained cell. The search stops after the second solution, which is enough to
 * tell a unique puzzle from an ambiguous one.
 */
export class BacktrackingSolver {
    private readonly rules: readonly Rule[];
    private readonly maxTier: number;
    private readonly maxFrames: number;
    private readonly options: BacktrackingOptions;

    /**
     * @param options - Tier limit, rule list, caps, known answer and trace hook.
     * @throws {ConfigurationError} If maxTier, maxIterations or maxFrames is out of range.
     */
    constructor(options: BacktrackingOptions = {}) {
        validateSolverOptions(options);
        const { maxTier = DEFAULT_MAX_TIER, rules = DEFAULT_RULES, maxFrames = Infinity } = options;
        if (maxFrames !== Infinity && (!Number.isInteger(maxFrames) || maxFrames < 1)) {
            throw new ConfigurationError(`maxFrames must be a positive integer, got ${maxFrames}.`);
        }
        this.maxTier = maxTier;
        this.rules = rules;
        this.maxFrames = maxFrames;
        this.options = options;
    }

    /**
     * Solves one puzzle.
     *
     * @param givens - Run-length encoded vertex clues.
     * @param width - Number of cell columns.
     * @param height - Number of cell rows.
     * @returns `mult` with the first solution found when there are several, `solved` with the
     * only solution, or `unsolved` with the last board examined.
     * @throws {ConfigurationError} If options.knownSolution does not fit the board.
     */
    public solve(givens: string, width: number, height: number): SolveResult {
        const { onTrace, knownSolution, maxIterations } = this.options;

        const board = createBoard(givens, width, height, knownSolution, onTrace);
        if (!board) return unbuildableResult();

        // Lookahead rules only repeat what the search does anyway.
        const engine = new RuleEngine(this.rules, Math.min(this.maxTier, SEARCH_RULE_TIER), { maxIterations, onTrace });

        const solutions: string[] = [];
        const stack: SearchFrame[] = [{ state: board.saveState(), depth: 0 }];
        let workScore = 0;
        let maxTierUsed = 0;
        let pushPops = 0;
        let popped = 0;
        let branched = false;

        while (stack.length > 0 && solutions.length < 2) {
            if (popped >= this.maxFrames) {
                if (onTrace) onTrace(`Search stopped after ${popped} frames`);
                break;
            }

            const frame = stack.pop();
            if (!frame) break;
            popped++;
            pushPops++;
            board.restoreState(frame.state);
            if (onTrace && frame.branch) {
                const { x, y, value } = frame.branch;
                onTrace(`Pop depth ${frame.depth}: (${x},${y}) = ${value === CellValue.SLASH ? '/' : '\\'}`);
            }

            const run = engine.run(board);
            workScore += run.workScore;
            maxTierUsed = Math.max(maxTierUsed, run.maxTierUsed);

            if (frame.depth === 0) {
                if (run.mismatch) {
                    return {
                        status: SolveStatus.UNSOLVED,
                        solution: board.toSolutionString(),
                        workScore: workScore + PUSH_POP_SCORE * pushPops,
                        maxTierUsed,
                    };
                }
                // From here on the search places wrong values on purpose.
                board.disableKnownSolutionChecks();
            }

            if (!board.isValid() || board.hasConflict()) continue;

            if (board.isSolved()) {
                if (board.isValidSolution()) {
                    solutions.push(board.toSolutionString());
                    if (onTrace) onTrace(`Solution ${solutions.length} found at depth ${frame.depth}`);
                }
                continue;
            }

            const cell = pickBranchCell(board);
            if (!cell) continue;
            const values = candidateValues(board, cell.x, cell.y);
            if (values.length === 0) continue;

            const saved = board.saveState();
            // Pushed in reverse so the most promising value is popped first.
            for (let i = values.length - 1; i >= 0; i--) {
                board.restoreState(saved);
                const placed = board.placeValue(cell.x, cell.y, values[i]);
                if (!placed.ok) continue;
                if (onTrace) {
                    onTrace(`Push depth ${frame.depth + 1}: (${cell.x},${cell.y}) = ${values[i] === CellValue.SLASH ? '/' : '\\'}`);
                }
                stack.push({
                    state: board.saveState(),
                    depth: frame.depth + 1,
                    branch: { x: cell.x, y: cell.y, value: values[i] },
                });
                pushPops++;
                branched = true;
            }
            board.restoreState(saved);
        }

        workScore += PUSH_POP_SCORE * pushPops;
        if (branched) maxTierUsed = BRANCH_TIER;

        let status: SolveStatus;
        if (solutions.length >= 2) {
            status = SolveStatus.MULTIPLE;
        } else if (solutions.length === 1) {
            status = SolveStatus.SOLVED;
        } else {
            status = SolveStatus.UNSOLVED;
        }

        return {
            status,
            solution: solutions.length > 0 ? solutions[0] : board.toSolutionString(),
            workScore,
            maxTierUsed,
        };
    }
}
