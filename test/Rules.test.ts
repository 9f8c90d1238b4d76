import { Board, VBITMAP_HORIZONTAL } from '../src/engine/Board';
import {
    adjacentOnes,
    adjacentThrees,
    borderTwoVShape,
    clueFinishA,
    clueFinishB,
    deadEndAvoidance,
    DEFAULT_RULES,
    edgeClueConstraints,
    equivalenceClasses,
    loopAvoidance2,
    noLoops,
    oneStepLookahead,
    trialClueViolation,
    unifiedDeduction,
    vbitmapPropagation,
    vPatternWithThree,
} from '../src/engine/Rules';
import { CellValue } from '../src/types';

/** Three diagonals of a diamond around the centre of a 2x2 board; (0,1) is left open. */
function openDiamond(): Board {
    const board = new Board(2, 2, 'i');
    board.placeValue(0, 0, CellValue.SLASH);
    board.placeValue(1, 0, CellValue.BACKSLASH);
    board.placeValue(1, 1, CellValue.SLASH);
    return board;
}

describe('Rules', () => {
    describe('DEFAULT_RULES', () => {
        it('should list every rule cheapest first with its tier', () => {
            expect(DEFAULT_RULES.map(r => [r.name, r.score, r.tier])).toEqual([
                ['clue_finish_b', 1, 1],
                ['clue_finish_a', 2, 1],
                ['no_loops', 2, 1],
                ['edge_clue_constraints', 2, 2],
                ['border_two_v_shape', 3, 2],
                ['loop_avoidance_2', 5, 1],
                ['v_pattern_with_three', 6, 2],
                ['adjacent_ones', 8, 2],
                ['adjacent_threes', 8, 2],
                ['dead_end_avoidance', 9, 2],
                ['equivalence_classes', 9, 2],
                ['vbitmap_propagation', 9, 2],
                ['unified_deduction', 9, 2],
                ['trial_clue_violation', 10, 3],
                ['one_step_lookahead', 15, 3],
            ]);
        });

        it('should not be modifiable', () => {
            expect(Object.isFrozen(DEFAULT_RULES)).toBe(true);
        });
    });

    describe('clue_finish_b', () => {
        it('should turn every open neighbour of a satisfied clue away from it', () => {
            const board = new Board(2, 2, 'd1d');
            board.placeValue(0, 0, CellValue.BACKSLASH);

            expect(clueFinishB(board)).toBe(true);
            expect(board.toSolutionString()).toBe('\\\\\\/');
            expect(clueFinishB(board)).toBe(false);
        });

        it('should leave an unsatisfied clue alone', () => {
            const board = new Board(2, 2, 'd1d');
            expect(clueFinishB(board)).toBe(false);
            expect(board.toSolutionString()).toBe('....');
        });
    });

    describe('clue_finish_a', () => {
        it('should point every cell at a 4', () => {
            const board = new Board(2, 2, 'd4d');
            expect(clueFinishA(board)).toBe(true);
            expect(board.toSolutionString()).toBe('\\//\\');
        });

        it('should finish a corner 1', () => {
            const board = new Board(1, 1, 'b1a');
            expect(clueFinishA(board)).toBe(true);
            expect(board.getCellValue(0, 0)).toBe(CellValue.SLASH);
        });
    });

    describe('no_loops', () => {
        it('should take the only orientation that does not close a loop', () => {
            const board = openDiamond();
            expect(noLoops(board)).toBe(true);
            expect(board.getCellValue(0, 1)).toBe(CellValue.SLASH);
        });

        it('should do nothing on an empty board', () => {
            expect(noLoops(new Board(2, 2, 'i'))).toBe(false);
        });
    });

    describe('loop_avoidance_2', () => {
        it('should make the third cell touch when a pair of touches would close a loop', () => {
            // The 2 at (1,1) has three open cells; (1,0) and (1,1) touching would join (2,0) and (2,2),
            // which the right column already connects.
            const board = new Board(3, 2, 'e2f');
            board.placeValue(2, 0, CellValue.BACKSLASH);
            board.placeValue(2, 1, CellValue.SLASH);
            board.placeValue(0, 1, CellValue.BACKSLASH);

            expect(loopAvoidance2(board)).toBe(true);
            expect(board.getCellValue(0, 0)).toBe(CellValue.BACKSLASH);
            expect(board.getCellValue(1, 0)).toBe(CellValue.UNKNOWN);
            expect(board.getCellValue(1, 1)).toBe(CellValue.UNKNOWN);
        });

        it('should not fire when no pair closes a loop', () => {
            const board = new Board(3, 2, 'e2f');
            board.placeValue(0, 1, CellValue.BACKSLASH);
            expect(loopAvoidance2(board)).toBe(false);
        });
    });

    describe('edge_clue_constraints', () => {
        it('should make both cells under an edge 2 touch it', () => {
            const board = new Board(2, 2, 'a2g');
            expect(edgeClueConstraints(board)).toBe(true);
            expect(board.toSolutionString()).toBe('/\\..');
        });

        it('should make the corner cell touch a corner 1', () => {
            const board = new Board(2, 2, '1h');
            expect(edgeClueConstraints(board)).toBe(true);
            expect(board.toSolutionString()).toBe('\\...');
        });
    });

    describe('border_two_v_shape', () => {
        it('should draw a V under an edge 2', () => {
            const board = new Board(2, 2, 'a2g');
            expect(borderTwoVShape(board)).toBe(true);
            expect(board.toSolutionString()).toBe('/\\..');
            expect(borderTwoVShape(board)).toBe(false);
        });
    });

    describe('v_pattern_with_three', () => {
        it('should not fire when the V leaves the 3 short of touches', () => {
            const board = new Board(2, 2, 'd3d');
            board.placeValue(0, 1, CellValue.BACKSLASH);
            board.placeValue(1, 1, CellValue.SLASH);

            expect(vPatternWithThree(board)).toBe(false);
            expect(board.toSolutionString()).toBe('..\\/');
        });
    });

    describe('adjacent_ones', () => {
        it('should turn the shared cell away from a satisfied 1', () => {
            const board = new Board(2, 2, 'a1b1d');
            board.placeValue(0, 0, CellValue.SLASH);

            expect(adjacentOnes(board)).toBe(true);
            expect(board.toSolutionString()).toBe('//..');
        });
    });

    describe('adjacent_threes', () => {
        it('should make the outer cells of a pair of 3s touch', () => {
            const board = new Board(3, 2, 'e33e');
            expect(adjacentThrees(board)).toBe(true);
            expect(board.toSolutionString()).toBe('\\.//.\\');
        });

        it('should ignore a pair on the border', () => {
            const board = new Board(3, 2, 'a33i');
            expect(adjacentThrees(board)).toBe(false);
        });
    });

    describe('dead_end_avoidance', () => {
        it('should refuse to join two sealed interior vertices', () => {
            const board = new Board(3, 3, 'e1d1e');
            expect(deadEndAvoidance(board)).toBe(true);
            expect(board.toSolutionString()).toBe('..../....');
        });
    });

    describe('equivalence_classes', () => {
        it('should pair the two cells a clue needs exactly one of', () => {
            const board = new Board(2, 2, 'a1g');
            expect(equivalenceClasses(board)).toBe(true);
            expect(board.getCellEquivRoot(0, 0)).toBe(board.getCellEquivRoot(1, 0));
            expect(board.toSolutionString()).toBe('....');
        });

        it('should copy a decided value to the rest of its class', () => {
            const board = new Board(2, 2, 'a1g');
            equivalenceClasses(board);
            board.placeValue(0, 0, CellValue.SLASH);

            expect(equivalenceClasses(board)).toBe(true);
            expect(board.getCellValue(1, 0)).toBe(CellValue.SLASH);
        });
    });

    describe('vbitmap_propagation', () => {
        it('should clear the V shapes an interior 1 rules out', () => {
            const board = new Board(2, 2, 'd1d');
            expect(vbitmapPropagation(board)).toBe(true);
            expect(board.vbitmapGet(0, 0)).toBe(0xA);
            expect(board.vbitmapGet(0, 1)).toBe(0xD);
            expect(board.vbitmapGet(1, 0)).toBe(0x7);
            expect(board.vbitmapGet(1, 1)).toBe(0xF);
            expect(vbitmapPropagation(board)).toBe(false);
        });

        it('should merge neighbours that can form no V', () => {
            const board = new Board(2, 1, 'f');
            board.vbitmapClear(0, 0, VBITMAP_HORIZONTAL);

            expect(vbitmapPropagation(board)).toBe(true);
            expect(board.getCellEquivRoot(0, 0)).toBe(board.getCellEquivRoot(1, 0));
        });
    });

    describe('unified_deduction', () => {
        it('should pair the remaining cells of a 2 once one adjacent pair is equivalent', () => {
            const board = new Board(2, 2, 'd2d');
            board.markCellsEquivalent(0, 0, 1, 0);

            expect(unifiedDeduction(board)).toBe(true);
            expect(board.getCellEquivRoot(0, 1)).toBe(board.getCellEquivRoot(1, 1));
            expect(board.getCellEquivRoot(0, 0)).not.toBe(board.getCellEquivRoot(0, 1));
            expect(board.toSolutionString()).toBe('....');
        });

        it('should stop on a conflicted board', () => {
            const board = new Board(2, 2, 'd1d');
            board.placeValue(0, 0, CellValue.SLASH);
            board.placeValue(0, 1, CellValue.BACKSLASH);
            board.markCellsEquivalent(0, 0, 0, 1);

            expect(unifiedDeduction(board)).toBe(false);
        });
    });

    describe('trial_clue_violation', () => {
        it('should drop the orientation that starves a clue', () => {
            const board = new Board(1, 1, 'b1a');
            expect(trialClueViolation(board)).toBe(true);
            expect(board.getCellValue(0, 0)).toBe(CellValue.SLASH);
        });
    });

    describe('one_step_lookahead', () => {
        it('should take the orientation that leaves the board loop free', () => {
            const board = openDiamond();
            expect(oneStepLookahead(board)).toBe(true);
            expect(board.getCellValue(0, 1)).toBe(CellValue.SLASH);
        });
    });
});
