import { Rule } from '../types';
import { KnownSolutionMismatchError } from '../errors';
import { defaultMaxIterations } from '../defaults';
import { Board } from './Board';

/**
 * Why a fixpoint run ended.
 */
export type EngineStopReason =
    | 'solved'
    | 'invalid'
    | 'conflict'
    | 'stuck'
    | 'iteration-cap'
    | 'known-solution-mismatch';

/**
 * The outcome of one fixpoint run.
 */
export interface EngineRunResult {
    /** Sum of the scores of every rule that made progress. */
    workScore: number;
    /** Highest tier among the rules that made progress, 0 if none did. */
    maxTierUsed: number;
    /** Number of rule applications that made progress. */
    iterations: number;
    /** Progress count per rule name. */
    firings: Record<string, number>;
    stopReason: EngineStopReason;
    /** Set when a rule placed a value that contradicts the board's known answer. */
    mismatch?: { rule: string; error: KnownSolutionMismatchError };
}

export interface RuleEngineOptions {
    /**
     * Cap on rule applications per run. Defaults to max(1000, 8 * cells) of the board being run.
     */
    maxIterations?: number;
    onTrace?: (message: string) => void;
}

/**
 * Drives a rule list to a fixpoint, cheapest rule first.
 *
 * Each iteration scans the rules in order and applies the first one that makes progress,
 * then starts the scan again from the top.
 */
export class RuleEngine {
    private readonly rules: readonly Rule[];
    private readonly maxIterations: number | undefined;
    private readonly onTrace: ((message: string) => void) | undefined;

    /**
     * @param rules - The ordered rule list.
     * @param maxTier - Rules above this tier are dropped once, here.
     * @param options - Iteration cap and trace hook.
     */
    constructor(rules: readonly Rule[], maxTier: number, options: RuleEngineOptions = {}) {
        this.rules = rules.filter(rule => rule.tier <= maxTier);
        this.maxIterations = options.maxIterations;
        this.onTrace = options.onTrace;
    }

    /**
     * The rules left after tier filtering, in scan order.
     */
    public get activeRules(): readonly Rule[] {
        return this.rules;
    }

    /**
     * Applies rules to the board until nothing more can be deduced.
     *
     * The run stops early when the board is solved, over-touches a clue, or holds an
     * equivalence conflict. A known-answer mismatch raised by a placement also ends the run;
     * it is reported in the result rather than thrown.
     *
     * @param board - The board to deduce on; modified in place.
     */
    public run(board: Board): EngineRunResult {
        const maxIterations = this.maxIterations ?? defaultMaxIterations(board.width * board.height);
        const firings: Record<string, number> = {};
        let workScore = 0;
        let maxTierUsed = 0;
        let iterations = 0;

        const finish = (stopReason: EngineStopReason, mismatch?: EngineRunResult['mismatch']): EngineRunResult => {
            if (this.onTrace) this.onTrace(`Engine stopped: ${stopReason} after ${iterations} iterations (work ${workScore})`);
            return { workScore, maxTierUsed, iterations, firings, stopReason, mismatch };
        };

        for (;;) {
            if (board.isSolved()) return finish('solved');
            if (!board.isValid()) return finish('invalid');
            if (board.hasConflict()) return finish('conflict');
            if (iterations >= maxIterations) {
                console.warn(`Rule engine hit its iteration cap of ${maxIterations}; the rule list may not converge.`);
                return finish('iteration-cap');
            }

            let fired: Rule | null = null;
            for (const rule of this.rules) {
                let progress: boolean;
                try {
                    progress = rule.apply(board);
                } catch (e) {
                    if (e instanceof KnownSolutionMismatchError) {
                        if (this.onTrace) this.onTrace(`Rule '${rule.name}' contradicted the known solution: ${e.message}`);
                        return finish('known-solution-mismatch', { rule: rule.name, error: e });
                    }
                    throw e;
                }
                if (progress) {
                    fired = rule;
                    break;
                }
            }

            if (!fired) return finish('stuck');

            iterations++;
            workScore += fired.score;
            maxTierUsed = Math.max(maxTierUsed, fired.tier);
            firings[fired.name] = (firings[fired.name] ?? 0) + 1;
            if (this.onTrace) {
                this.onTrace(`Rule '${fired.name}' (tier ${fired.tier}) made progress (iteration ${iterations})`);
            }
        }
    }
}
