import { AdjacentCell, CellValue, Clue, CluedVertex, PlacementResult } from '../types';
import { ConfigurationError, KnownSolutionMismatchError, LoopFormedError, MalformedGivensError } from '../errors';
import { decodeGivens, encodeGivens } from './Givens';

/**
 * Orientation bitmap bits. Horizontal bits describe a cell and its right neighbour,
 * vertical bits a cell and the cell below it.
 */
export const VBITMAP_DOWN_V = 0x1;   // \/
export const VBITMAP_UP_V = 0x2;     // /\
export const VBITMAP_RIGHT_V = 0x4;  // \ over /, i.e. >
export const VBITMAP_LEFT_V = 0x8;   // / over \, i.e. <
export const VBITMAP_HORIZONTAL = VBITMAP_DOWN_V | VBITMAP_UP_V;
export const VBITMAP_VERTICAL = VBITMAP_RIGHT_V | VBITMAP_LEFT_V;
export const VBITMAP_ALL = VBITMAP_HORIZONTAL | VBITMAP_VERTICAL;

/**
 * A full copy of every mutable structure of a Board.
 * Restoring it brings the board back exactly; nothing is shared with the live board.
 */
export interface BoardState {
    cellValues: CellValue[];
    parent: number[];
    rank: number[];
    equivParent: number[];
    equivRank: number[];
    classValue: CellValue[];
    vbitmap: number[];
    exits: number[];
    border: boolean[];
    conflict: boolean;
}

/**
 * Options for constructing a Board.
 */
export interface BoardOptions {
    /**
     * A recorded answer. Placements that disagree with it throw KnownSolutionMismatchError.
     */
    knownSolution?: string;
}

/**
 * The state of a Slants grid.
 *
 * Cells hold a diagonal, vertices hold optional clues. Besides the cell values the board keeps:
 * - a union-find over vertices, so a diagonal joining two connected vertices is refused (no loops),
 *   with the aggregate `exits` and `border` of each group kept at its root;
 * - a union-find over cells recording cells deduced to share an orientation, with the class's
 *   determined value kept at its root;
 * - a 4-bit orientation bitmap per cell.
 */
export class Board {
    public readonly width: number;
    public readonly height: number;

    private readonly clues: Clue[];
    private cells: CellValue[];

    private parent: number[];
    private rank: number[];
    private exits: number[];
    private border: boolean[];

    private equivParent: number[];
    private equivRank: number[];
    private classValue: CellValue[];

    private vbitmap: number[];
    private conflict = false;

    private knownSolution: CellValue[] | null = null;

    /**
     * Creates a new Board.
     *
     * @param width - Number of cell columns.
     * @param height - Number of cell rows.
     * @param givens - Run-length encoded vertex clues.
     * @param options - Optional known answer for checking placements.
     * @throws {ConfigurationError} If width or height is not a positive integer.
     * @throws {MalformedGivensError} If the givens do not decode to exactly (width + 1) * (height + 1) vertices.
     */
    constructor(width: number, height: number, givens: string, options: BoardOptions = {}) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
            throw new ConfigurationError(`Board dimensions must be positive integers, got ${width}x${height}.`);
        }
        this.width = width;
        this.height = height;

        const expected = (width + 1) * (height + 1);
        let decoded: Clue[];
        try {
            decoded = decodeGivens(givens);
        } catch (e) {
            if (e instanceof MalformedGivensError) {
                throw new MalformedGivensError(e.message, expected, -1);
            }
            throw e;
        }
        if (decoded.length !== expected) {
            throw new MalformedGivensError(
                `Givens decode to ${decoded.length} vertices, expected ${expected}.`,
                expected,
                decoded.length,
            );
        }
        this.clues = decoded;

        const cellCount = width * height;
        this.cells = Array(cellCount).fill(CellValue.UNKNOWN);

        this.parent = Array.from({ length: expected }, (_, i) => i);
        this.rank = Array(expected).fill(0);
        this.exits = decoded.map(c => (c === null ? 4 : c));
        this.border = Array(expected).fill(false);
        for (let vy = 0; vy <= height; vy++) {
            for (let vx = 0; vx <= width; vx++) {
                if (vx === 0 || vy === 0 || vx === width || vy === height) {
                    this.border[this.vertexIndex(vx, vy)] = true;
                }
            }
        }

        this.equivParent = Array.from({ length: cellCount }, (_, i) => i);
        this.equivRank = Array(cellCount).fill(0);
        this.classValue = Array(cellCount).fill(CellValue.UNKNOWN);

        this.vbitmap = Array(cellCount).fill(VBITMAP_ALL);

        if (options.knownSolution !== undefined) {
            this.setKnownSolution(options.knownSolution);
        }
    }

    // --- Indexing ---

    private vertexIndex(vx: number, vy: number): number {
        return vy * (this.width + 1) + vx;
    }

    private cellIndex(x: number, y: number): number {
        return y * this.width + x;
    }

    // --- Vertex union-find ---

    private find(i: number): number {
        let root = i;
        while (this.parent[root] !== root) root = this.parent[root];
        while (this.parent[i] !== root) {
            const next = this.parent[i];
            this.parent[i] = root;
            i = next;
        }
        return root;
    }

    /**
     * Joins the groups of two vertices. Returns false (and changes nothing) if they are
     * already joined, since the new edge would close a loop.
     */
    private union(a: number, b: number): boolean {
        let ra = this.find(a);
        let rb = this.find(b);
        if (ra === rb) return false;

        const mergedExits = this.exits[ra] + this.exits[rb] - 2;
        const mergedBorder = this.border[ra] || this.border[rb];

        if (this.rank[ra] < this.rank[rb]) {
            [ra, rb] = [rb, ra];
        }
        this.parent[rb] = ra;
        if (this.rank[ra] === this.rank[rb]) {
            this.rank[ra]++;
        }

        this.exits[ra] = mergedExits;
        this.border[ra] = mergedBorder;
        return true;
    }

    private decrementExits(vx: number, vy: number): void {
        const idx = this.vertexIndex(vx, vy);
        // A clue fixes the number of touches, so avoiding it does not use up an exit.
        if (this.clues[idx] !== null) return;
        this.exits[this.find(idx)]--;
    }

    /**
     * The two vertices a diagonal joins, then the two it avoids.
     */
    private diagonalVertices(x: number, y: number, value: CellValue): [number, number, [number, number], [number, number]] {
        if (value === CellValue.SLASH) {
            return [this.vertexIndex(x, y + 1), this.vertexIndex(x + 1, y), [x, y], [x + 1, y + 1]];
        }
        return [this.vertexIndex(x, y), this.vertexIndex(x + 1, y + 1), [x + 1, y], [x, y + 1]];
    }

    /**
     * Gets the root index of the group a vertex belongs to.
     */
    public getVertexRoot(vx: number, vy: number): number {
        return this.find(this.vertexIndex(vx, vy));
    }

    /**
     * Gets the remaining exits of the group a vertex belongs to.
     */
    public getVertexGroupExits(vx: number, vy: number): number {
        return this.exits[this.getVertexRoot(vx, vy)];
    }

    /**
     * Whether the group a vertex belongs to reaches the edge of the grid.
     */
    public getVertexGroupBorder(vx: number, vy: number): boolean {
        return this.border[this.getVertexRoot(vx, vy)];
    }

    // --- Cells and vertices ---

    public getCellValue(x: number, y: number): CellValue {
        return this.cells[this.cellIndex(x, y)];
    }

    /**
     * Gets the clue of a vertex, or null if it has none.
     */
    public getClue(vx: number, vy: number): Clue {
        return this.clues[this.vertexIndex(vx, vy)];
    }

    /**
     * Lists every clued vertex in row-major order.
     */
    public getCluedVertices(): CluedVertex[] {
        const result: CluedVertex[] = [];
        for (let vy = 0; vy <= this.height; vy++) {
            for (let vx = 0; vx <= this.width; vx++) {
                const clue = this.clues[this.vertexIndex(vx, vy)];
                if (clue !== null) result.push({ vx, vy, clue });
            }
        }
        return result;
    }

    /**
     * Lists the coordinates of every undecided cell in row-major order.
     */
    public getUnknownCells(): Array<{ x: number; y: number }> {
        const result: Array<{ x: number; y: number }> = [];
        for (let y = 0; y < this.height; y++) {
            for (let x = 0; x < this.width; x++) {
                if (this.cells[this.cellIndex(x, y)] === CellValue.UNKNOWN) result.push({ x, y });
            }
        }
        return result;
    }

    /**
     * Lists the cells around a vertex with the value that would touch it, in the order
     * top-left, top-right, bottom-left, bottom-right. Border vertices have fewer.
     */
    public getAdjacentCells(vx: number, vy: number): AdjacentCell[] {
        const result: AdjacentCell[] = [];
        if (vx > 0 && vy > 0) result.push({ x: vx - 1, y: vy - 1, touching: CellValue.BACKSLASH });
        if (vx < this.width && vy > 0) result.push({ x: vx, y: vy - 1, touching: CellValue.SLASH });
        if (vx > 0 && vy < this.height) result.push({ x: vx - 1, y: vy, touching: CellValue.SLASH });
        if (vx < this.width && vy < this.height) result.push({ x: vx, y: vy, touching: CellValue.BACKSLASH });
        return result;
    }

    /**
     * Counts the diagonals already touching a vertex and the undecided cells around it.
     */
    public countTouches(vx: number, vy: number): { touches: number; unknown: number } {
        let touches = 0;
        let unknown = 0;
        for (const adj of this.getAdjacentCells(vx, vy)) {
            const value = this.getCellValue(adj.x, adj.y);
            if (value === CellValue.UNKNOWN) {
                unknown++;
            } else if (value === adj.touching) {
                touches++;
            }
        }
        return { touches, unknown };
    }

    // --- Placement ---

    /**
     * Checks whether placing a value would close a loop. Does not modify the board.
     */
    public wouldFormLoop(x: number, y: number, value: CellValue): boolean {
        const [v1, v2] = this.diagonalVertices(x, y, value);
        return this.find(v1) === this.find(v2);
    }

    /**
     * Places a diagonal in a cell.
     *
     * A cell that already holds a value is left alone. Otherwise the two touched vertices are
     * joined, the two avoided vertices each lose an exit (unless clued), and the cell's
     * equivalence class takes the value.
     *
     * @returns The outcome; `{ ok: false }` carries a LoopFormedError and leaves the board untouched.
     * @throws {KnownSolutionMismatchError} If checking against a known answer and the value disagrees with it.
     */
    public placeValue(x: number, y: number, value: CellValue): PlacementResult {
        const idx = this.cellIndex(x, y);
        if (this.cells[idx] !== CellValue.UNKNOWN) {
            return { ok: true, changed: false };
        }

        const [v1, v2, avoid1, avoid2] = this.diagonalVertices(x, y, value);
        if (this.find(v1) === this.find(v2)) {
            return { ok: false, error: new LoopFormedError(x, y, value) };
        }

        if (this.knownSolution) {
            const expected = this.knownSolution[idx];
            if (expected !== CellValue.UNKNOWN && expected !== value) {
                throw new KnownSolutionMismatchError(x, y, value, expected);
            }
        }

        this.union(v1, v2);
        this.decrementExits(avoid1[0], avoid1[1]);
        this.decrementExits(avoid2[0], avoid2[1]);

        this.cells[idx] = value;
        this.classValue[this.equivFind(idx)] = value;

        return { ok: true, changed: true };
    }

    // --- Equivalence classes ---

    private equivFind(i: number): number {
        let root = i;
        while (this.equivParent[root] !== root) root = this.equivParent[root];
        while (this.equivParent[i] !== root) {
            const next = this.equivParent[i];
            this.equivParent[i] = root;
            i = next;
        }
        return root;
    }

    /**
     * Gets the root index of a cell's equivalence class.
     */
    public getCellEquivRoot(x: number, y: number): number {
        return this.equivFind(this.cellIndex(x, y));
    }

    /**
     * Records that two cells must end up with the same orientation.
     *
     * @returns true if two classes were merged; false if they were already one class, or if
     * their determined values disagree. A disagreement also marks the board as conflicted.
     */
    public markCellsEquivalent(x1: number, y1: number, x2: number, y2: number): boolean {
        let r1 = this.getCellEquivRoot(x1, y1);
        let r2 = this.getCellEquivRoot(x2, y2);
        if (r1 === r2) return false;

        const v1 = this.classValue[r1];
        const v2 = this.classValue[r2];
        if (v1 !== CellValue.UNKNOWN && v2 !== CellValue.UNKNOWN && v1 !== v2) {
            this.conflict = true;
            return false;
        }
        const merged = v1 !== CellValue.UNKNOWN ? v1 : v2;

        if (this.equivRank[r1] < this.equivRank[r2]) {
            [r1, r2] = [r2, r1];
        }
        this.equivParent[r2] = r1;
        if (this.equivRank[r1] === this.equivRank[r2]) {
            this.equivRank[r1]++;
        }
        this.classValue[r1] = merged;
        return true;
    }

    /**
     * Gets the determined value of a cell's equivalence class (UNKNOWN if none yet).
     */
    public getEquivalenceClassValue(x: number, y: number): CellValue {
        return this.classValue[this.getCellEquivRoot(x, y)];
    }

    /**
     * Lists every cell in the same equivalence class as the given one, itself included.
     */
    public getEquivalentCells(x: number, y: number): Array<{ x: number; y: number }> {
        const root = this.getCellEquivRoot(x, y);
        const result: Array<{ x: number; y: number }> = [];
        for (let cy = 0; cy < this.height; cy++) {
            for (let cx = 0; cx < this.width; cx++) {
                if (this.getCellEquivRoot(cx, cy) === root) result.push({ x: cx, y: cy });
            }
        }
        return result;
    }

    /**
     * Whether an equivalence merge has met two different determined values.
     */
    public hasConflict(): boolean {
        return this.conflict;
    }

    // --- Orientation bitmap ---

    public vbitmapGet(x: number, y: number): number {
        return this.vbitmap[this.cellIndex(x, y)];
    }

    /**
     * Clears bits from a cell's orientation bitmap.
     *
     * @returns true if any bit was set before.
     */
    public vbitmapClear(x: number, y: number, bits: number): boolean {
        const idx = this.cellIndex(x, y);
        const old = this.vbitmap[idx];
        const next = old & ~bits;
        if (next === old) return false;
        this.vbitmap[idx] = next;
        return true;
    }

    // --- Status ---

    /**
     * Whether every cell holds a value.
     */
    public isSolved(): boolean {
        return this.cells.every(v => v !== CellValue.UNKNOWN);
    }

    /**
     * Whether no clued vertex is touched by more diagonals than its clue.
     */
    public isValid(): boolean {
        for (const { vx, vy, clue } of this.getCluedVertices()) {
            if (this.countTouches(vx, vy).touches > clue) return false;
        }
        return true;
    }

    /**
     * Whether the board is completely filled and every clue is met exactly.
     * Loops cannot exist, since placeValue refuses them.
     */
    public isValidSolution(): boolean {
        if (!this.isSolved()) return false;
        for (const { vx, vy, clue } of this.getCluedVertices()) {
            if (this.countTouches(vx, vy).touches !== clue) return false;
        }
        return true;
    }

    /**
     * Checks that every placed cell agrees with a recorded answer.
     * Undecided cells, and '.' in the answer, are not compared.
     */
    public checkAgainstSolution(known: string): boolean {
        for (let i = 0; i < this.cells.length; i++) {
            const value = this.cells[i];
            if (value === CellValue.UNKNOWN) continue;
            if (i >= known.length) return false;
            const expected = charToValue(known[i]);
            if (expected !== CellValue.UNKNOWN && expected !== value) return false;
        }
        return true;
    }

    /**
     * Starts checking every later placement against a recorded answer.
     *
     * @throws {ConfigurationError} If the answer does not have one character per cell.
     */
    public setKnownSolution(solution: string): void {
        this.knownSolution = parseSolution(solution, this.cells.length);
    }

    /**
     * Stops checking placements against the known answer.
     * The backtracking search places wrong values on purpose.
     */
    public disableKnownSolutionChecks(): void {
        this.knownSolution = null;
    }

    // --- Snapshots ---

    /**
     * Copies every mutable structure out of the board.
     */
    public saveState(): BoardState {
        return {
            cellValues: [...this.cells],
            parent: [...this.parent],
            rank: [...this.rank],
            equivParent: [...this.equivParent],
            equivRank: [...this.equivRank],
            classValue: [...this.classValue],
            vbitmap: [...this.vbitmap],
            exits: [...this.exits],
            border: [...this.border],
            conflict: this.conflict,
        };
    }

    /**
     * Restores a snapshot taken by saveState. The snapshot stays usable afterwards.
     */
    public restoreState(state: BoardState): void {
        this.cells = [...state.cellValues];
        this.parent = [...state.parent];
        this.rank = [...state.rank];
        this.equivParent = [...state.equivParent];
        this.equivRank = [...state.equivRank];
        this.classValue = [...state.classValue];
        this.vbitmap = [...state.vbitmap];
        this.exits = [...state.exits];
        this.border = [...state.border];
        this.conflict = state.conflict;
    }

    // --- Encoding ---

    /**
     * Renders the cells as a solution string: '/', '\' or '.' per cell, row-major.
     */
    public toSolutionString(): string {
        return this.cells.map(valueToChar).join('');
    }

    /**
     * Re-encodes the board's clues as a run-length givens string.
     */
    public encodeGivens(): string {
        return encodeGivens(this.clues);
    }

    /**
     * Draws the board: vertex rows show clues ('.' when unclued), cell rows show diagonals.
     *
     * ```
     * 1-.-.
     * |\|/|
     * .-2-.
     * ```
     */
    public toString(): string {
        const lines: string[] = [];
        const vertexRow = (vy: number) => {
            const parts: string[] = [];
            for (let vx = 0; vx <= this.width; vx++) {
                const clue = this.getClue(vx, vy);
                parts.push(clue === null ? '.' : String(clue));
            }
            return parts.join('-');
        };

        lines.push(vertexRow(0));
        for (let y = 0; y < this.height; y++) {
            let row = '|';
            for (let x = 0; x < this.width; x++) {
                row += valueToChar(this.getCellValue(x, y)) + '|';
            }
            lines.push(row);
            lines.push(vertexRow(y + 1));
        }
        return lines.join('\n');
    }
}

function valueToChar(value: CellValue): string {
    switch (value) {
        case CellValue.SLASH: return '/';
        case CellValue.BACKSLASH: return '\\';
        default: return '.';
    }
}

function charToValue(ch: string): CellValue {
    if (ch === '/') return CellValue.SLASH;
    if (ch === '\\') return CellValue.BACKSLASH;
    return CellValue.UNKNOWN;
}

function parseSolution(solution: string, cellCount: number): CellValue[] {
    if (solution.length !== cellCount) {
        throw new ConfigurationError(`Known solution has ${solution.length} cells, expected ${cellCount}.`);
    }
    return [...solution].map(charToValue);
}

/**
 * Gets the value that avoids a vertex, given the value that touches it.
 */
export function opposite(value: CellValue): CellValue {
    return value === CellValue.SLASH ? CellValue.BACKSLASH : CellValue.SLASH;
}
