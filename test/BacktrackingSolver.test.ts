import { BacktrackingSolver, candidateValues, pickBranchCell, scoreCell } from '../src/engine/BacktrackingSolver';
import { Board } from '../src/engine/Board';
import { ConfigurationError } from '../src/errors';
import { CellValue, SolveStatus } from '../src/types';

describe('BacktrackingSolver', () => {
    describe('branch heuristics', () => {
        it('should prefer cells next to a satisfied clue', () => {
            const board = new Board(2, 2, 'd1d');
            board.placeValue(0, 0, CellValue.BACKSLASH);

            expect(scoreCell(board, 1, 0)).toBe(100);
            expect(pickBranchCell(board)).toEqual({ x: 1, y: 0 });
        });

        it('should drop an orientation that over-touches a clue', () => {
            const board = new Board(2, 2, 'd1d');
            board.placeValue(0, 0, CellValue.BACKSLASH);

            expect(candidateValues(board, 1, 0)).toEqual([CellValue.BACKSLASH]);
        });

        it('should try the orientation touching a clue first', () => {
            const board = new Board(1, 1, '4c');
            expect(scoreCell(board, 0, 0)).toBe(50);
            expect(candidateValues(board, 0, 0)).toEqual([CellValue.BACKSLASH, CellValue.SLASH]);
        });

        it('should keep slash first when nothing tells the two apart', () => {
            const board = new Board(1, 1, 'd');
            expect(scoreCell(board, 0, 0)).toBe(0);
            expect(candidateValues(board, 0, 0)).toEqual([CellValue.SLASH, CellValue.BACKSLASH]);
        });

        it('should drop an orientation that closes a loop', () => {
            const board = new Board(2, 2, 'i');
            board.placeValue(0, 0, CellValue.SLASH);
            board.placeValue(1, 0, CellValue.BACKSLASH);
            board.placeValue(1, 1, CellValue.SLASH);

            expect(candidateValues(board, 0, 1)).toEqual([CellValue.SLASH]);
        });

        it('should find no cell on a full board', () => {
            const board = new Board(1, 1, 'd');
            board.placeValue(0, 0, CellValue.SLASH);
            expect(pickBranchCell(board)).toBeNull();
        });
    });

    describe('solve', () => {
        it('should not need to branch on a deducible puzzle', () => {
            const result = new BacktrackingSolver().solve('g4a12b12a31113b113a12g', 5, 5);
            expect(result).toEqual({
                status: SolveStatus.SOLVED,
                solution: '\\//\\\\/\\\\\\\\\\\\\\/\\\\/\\\\\\\\\\\\//',
                workScore: 31,
                maxTierUsed: 2,
            });
        });

        it('should branch to finish a puzzle the rules cannot', () => {
            const result = new BacktrackingSolver().solve('a11a01d2212a0b2b1a11', 4, 4);
            expect(result).toEqual({
                status: SolveStatus.SOLVED,
                solution: '///\\//\\\\\\\\\\\\//\\\\',
                workScore: 40,
                maxTierUsed: 3,
            });
        });

        it('should keep to the tier limit between branches', () => {
            const result = new BacktrackingSolver({ maxTier: 1 }).solve('a211a1b3c4c3a2f', 4, 4);
            expect(result.status).toBe(SolveStatus.SOLVED);
            expect(result.workScore).toBe(13);
            expect(result.maxTierUsed).toBe(1);
        });

        it('should report two solutions as mult with the first one found', () => {
            const trace: string[] = [];
            const result = new BacktrackingSolver({ onTrace: m => trace.push(m) }).solve('1h', 2, 2);

            expect(result).toEqual({
                status: SolveStatus.MULTIPLE,
                solution: '\\///',
                workScore: 51,
                maxTierUsed: 3,
            });
            expect(trace.filter(m => m.startsWith('Solution '))).toHaveLength(2);
        });

        it('should report an impossible puzzle as unsolved after exhausting the search', () => {
            expect(new BacktrackingSolver().solve('4c', 1, 1)).toEqual({
                status: SolveStatus.UNSOLVED,
                solution: '/',
                workScore: 10,
                maxTierUsed: 3,
            });
        });

        it('should trace every push and pop with its depth', () => {
            const trace: string[] = [];
            new BacktrackingSolver({ onTrace: m => trace.push(m) }).solve('4c', 1, 1);

            expect(trace.filter(m => m.startsWith('Push ') || m.startsWith('Pop '))).toEqual([
                'Push depth 1: (0,0) = /',
                'Push depth 1: (0,0) = \\',
                'Pop depth 1: (0,0) = \\',
                'Pop depth 1: (0,0) = /',
            ]);
        });

        it('should stop after the frame limit', () => {
            const trace: string[] = [];
            const result = new BacktrackingSolver({ maxFrames: 1, onTrace: m => trace.push(m) }).solve('1h', 2, 2);

            expect(result).toEqual({
                status: SolveStatus.UNSOLVED,
                solution: '\\...',
                workScore: 17,
                maxTierUsed: 3,
            });
            expect(trace[trace.length - 1]).toBe('Search stopped after 1 frames');
        });

        it('should charge the root frame even when no branch is needed', () => {
            expect(new BacktrackingSolver().solve('0c', 1, 1)).toEqual({
                status: SolveStatus.SOLVED,
                solution: '/',
                workScore: 3,
                maxTierUsed: 1,
            });
        });

        it('should stop before searching when the rules contradict the known answer', () => {
            const result = new BacktrackingSolver({ knownSolution: '\\' }).solve('b1a', 1, 1);
            expect(result).toEqual({ status: SolveStatus.UNSOLVED, solution: '.', workScore: 2, maxTierUsed: 0 });
        });

        it('should search past wrong guesses when a known answer is given', () => {
            const solution = '///\\//\\\\\\\\\\\\//\\\\';
            const result = new BacktrackingSolver({ knownSolution: solution }).solve('a11a01d2212a0b2b1a11', 4, 4);
            expect(result.status).toBe(SolveStatus.SOLVED);
            expect(result.solution).toBe(solution);
        });

        it('should throw when the recorded answer does not fit the board', () => {
            const solver = new BacktrackingSolver({ knownSolution: '/' });
            expect(() => solver.solve('i', 2, 2)).toThrow('Known solution has 1 cells, expected 4.');
        });

        it('should report malformed givens as unsolved with no solution', () => {
            expect(new BacktrackingSolver().solve('g4b12b12a31113b113a12g', 5, 5)).toEqual({
                status: SolveStatus.UNSOLVED,
                solution: '',
                workScore: 0,
                maxTierUsed: 0,
            });
        });
    });

    it('should reject a frame limit that is not a positive integer', () => {
        expect(() => new BacktrackingSolver({ maxFrames: 0 })).toThrow(ConfigurationError);
        expect(() => new BacktrackingSolver({ maxFrames: 2.5 })).toThrow('maxFrames must be a positive integer, got 2.5.');
        expect(() => new BacktrackingSolver({ maxTier: -1 })).toThrow(ConfigurationError);
    });
});
