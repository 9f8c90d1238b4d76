import { AdjacentCell, CellValue, Rule } from '../types';
import {
    Board,
    opposite,
    VBITMAP_DOWN_V,
    VBITMAP_HORIZONTAL,
    VBITMAP_LEFT_V,
    VBITMAP_RIGHT_V,
    VBITMAP_UP_V,
    VBITMAP_VERTICAL,
} from './Board';

/**
 * Places a value, reporting whether the board changed.
 * A placement that would close a loop is skipped.
 */
function place(board: Board, x: number, y: number, value: CellValue): boolean {
    const result = board.placeValue(x, y, value);
    return result.ok && result.changed;
}

/**
 * Places the value that touches (or avoids) the vertex the cell was listed for.
 */
function placeAdjacent(board: Board, adj: AdjacentCell, touch: boolean): boolean {
    return place(board, adj.x, adj.y, touch ? adj.touching : opposite(adj.touching));
}

function unknownAdjacent(board: Board, vx: number, vy: number): AdjacentCell[] {
    return board.getAdjacentCells(vx, vy).filter(adj => board.getCellValue(adj.x, adj.y) === CellValue.UNKNOWN);
}

function sameCell(a: { x: number; y: number }, b: { x: number; y: number }): boolean {
    return a.x === b.x && a.y === b.y;
}

function isOrthogonal(a: { x: number; y: number }, b: { x: number; y: number }): boolean {
    return Math.abs(a.x - b.x) + Math.abs(a.y - b.y) === 1;
}

const ORTHOGONAL_STEPS: ReadonlyArray<[number, number]> = [[1, 0], [-1, 0], [0, 1], [0, -1]];

function getClueAt(board: Board, vx: number, vy: number): number | null {
    if (vx < 0 || vy < 0 || vx > board.width || vy > board.height) return null;
    return board.getClue(vx, vy);
}

// --- Tier 1 ---

/**
 * A clue that already has all its touches: every undecided neighbour avoids it.
 */
export function clueFinishB(board: Board): boolean {
    let progress = false;
    for (const { vx, vy, clue } of board.getCluedVertices()) {
        const { touches, unknown } = board.countTouches(vx, vy);
        if (touches !== clue || unknown === 0) continue;
        for (const adj of unknownAdjacent(board, vx, vy)) {
            if (placeAdjacent(board, adj, false)) progress = true;
        }
    }
    return progress;
}

/**
 * A clue that needs every undecided neighbour: they all touch it.
 */
export function clueFinishA(board: Board): boolean {
    let progress = false;
    for (const { vx, vy, clue } of board.getCluedVertices()) {
        const { touches, unknown } = board.countTouches(vx, vy);
        const needed = clue - touches;
        if (needed <= 0 || needed !== unknown) continue;
        for (const adj of unknownAdjacent(board, vx, vy)) {
            if (placeAdjacent(board, adj, true)) progress = true;
        }
    }
    return progress;
}

/**
 * A cell where exactly one orientation closes a loop takes the other.
 */
export function noLoops(board: Board): boolean {
    let progress = false;
    for (const { x, y } of board.getUnknownCells()) {
        const slashLoops = board.wouldFormLoop(x, y, CellValue.SLASH);
        const backslashLoops = board.wouldFormLoop(x, y, CellValue.BACKSLASH);
        if (slashLoops && !backslashLoops) {
            if (place(board, x, y, CellValue.BACKSLASH)) progress = true;
        } else if (backslashLoops && !slashLoops) {
            if (place(board, x, y, CellValue.SLASH)) progress = true;
        }
    }
    return progress;
}

/**
 * A vertex needing exactly two touches from three undecided cells.
 * If two of those cells touching together would join vertices that are already connected,
 * that pair cannot be the one that touches, so the third cell must touch.
 */
export function loopAvoidance2(board: Board): boolean {
    let progress = false;
    for (const { vx, vy, clue } of board.getCluedVertices()) {
        const { touches } = board.countTouches(vx, vy);
        const cells = unknownAdjacent(board, vx, vy);
        if (clue - touches !== 2 || cells.length !== 3) continue;

        const centre = board.getVertexRoot(vx, vy);
        // The far end of each touching diagonal is the corner opposite the vertex.
        const farRoots = cells.map(c => board.getVertexRoot(2 * c.x + 1 - vx, 2 * c.y + 1 - vy));

        for (let skip = 0; skip < 3; skip++) {
            const [a, b] = [0, 1, 2].filter(i => i !== skip);
            const ra = farRoots[a];
            const rb = farRoots[b];
            if (ra === rb || ra === centre || rb === centre) {
                if (placeAdjacent(board, cells[skip], true)) progress = true;
                break;
            }
        }
    }
    return progress;
}

// --- Tier 2 ---

/**
 * A clue equal to the number of cells around its vertex: every one of them touches.
 */
export function edgeClueConstraints(board: Board): boolean {
    let progress = false;
    for (const { vx, vy, clue } of board.getCluedVertices()) {
        const adjacent = board.getAdjacentCells(vx, vy);
        if (clue !== adjacent.length) continue;
        for (const adj of adjacent) {
            if (board.getCellValue(adj.x, adj.y) !== CellValue.UNKNOWN) continue;
            if (placeAdjacent(board, adj, true)) progress = true;
        }
    }
    return progress;
}

/**
 * A 2 on an edge vertex with two cells: both touch, forming a V.
 */
export function borderTwoVShape(board: Board): boolean {
    let progress = false;
    for (const { vx, vy, clue } of board.getCluedVertices()) {
        if (clue !== 2) continue;
        const adjacent = board.getAdjacentCells(vx, vy);
        if (adjacent.length !== 2) continue;
        const { touches, unknown } = board.countTouches(vx, vy);
        if (touches + unknown !== 2 || unknown === 0) continue;
        for (const adj of unknownAdjacent(board, vx, vy)) {
            if (placeAdjacent(board, adj, true)) progress = true;
        }
    }
    return progress;
}

/**
 * A V shape whose arms avoid a 3: once that 3 has two touches, its undecided cells on the
 * far side of the V touch it.
 */
export function vPatternWithThree(board: Board): boolean {
    let progress = false;
    for (let y = 0; y < board.height; y++) {
        for (let x = 0; x + 1 < board.width; x++) {
            const left = board.getCellValue(x, y);
            const right = board.getCellValue(x + 1, y);

            let vy: number;
            let farSide: (cellY: number) => boolean;
            if (left === CellValue.BACKSLASH && right === CellValue.SLASH) {
                vy = y;
                farSide = cellY => cellY < y;
            } else if (left === CellValue.SLASH && right === CellValue.BACKSLASH) {
                vy = y + 1;
                farSide = cellY => cellY > y;
            } else {
                continue;
            }

            if (board.getClue(x + 1, vy) !== 3) continue;
            const { touches, unknown } = board.countTouches(x + 1, vy);
            if (touches !== 2 || unknown === 0) continue;

            for (const adj of unknownAdjacent(board, x + 1, vy)) {
                if (!farSide(adj.y)) continue;
                if (placeAdjacent(board, adj, true)) progress = true;
            }
        }
    }
    return progress;
}

/**
 * A satisfied 1 next to another 1: the cells they share avoid the satisfied one.
 */
export function adjacentOnes(board: Board): boolean {
    let progress = false;
    for (const { vx, vy, clue } of board.getCluedVertices()) {
        if (clue !== 1 || board.countTouches(vx, vy).touches !== 1) continue;

        for (const [dx, dy] of ORTHOGONAL_STEPS) {
            if (getClueAt(board, vx + dx, vy + dy) !== 1) continue;
            const neighbourCells = board.getAdjacentCells(vx + dx, vy + dy);
            for (const adj of unknownAdjacent(board, vx, vy)) {
                if (!neighbourCells.some(n => sameCell(n, adj))) continue;
                if (placeAdjacent(board, adj, false)) progress = true;
            }
        }
    }
    return progress;
}

/**
 * Two orthogonally adjacent 3s. Each shared cell touches exactly one of the pair, so when the
 * cells around the pair can only just reach both clues, every unshared cell touches its own 3.
 */
export function adjacentThrees(board: Board): boolean {
    let progress = false;
    for (const { vx, vy, clue } of board.getCluedVertices()) {
        if (clue !== 3) continue;

        // Right and down only, so each pair is seen once.
        for (const [dx, dy] of [[1, 0], [0, 1]]) {
            const nx = vx + dx;
            const ny = vy + dy;
            if (getClueAt(board, nx, ny) !== 3) continue;

            const mine = board.getAdjacentCells(vx, vy);
            const theirs = board.getAdjacentCells(nx, ny);
            const shared = mine.filter(a => theirs.some(b => sameCell(a, b)));
            const myOwn = mine.filter(a => !shared.some(s => sameCell(a, s)));
            const theirOwn = theirs.filter(b => !shared.some(s => sameCell(b, s)));

            if (myOwn.length + theirOwn.length + shared.length !== 6) continue;

            for (const adj of [...myOwn, ...theirOwn]) {
                if (board.getCellValue(adj.x, adj.y) !== CellValue.UNKNOWN) continue;
                if (placeAdjacent(board, adj, true)) progress = true;
            }
        }
    }
    return progress;
}

/**
 * Whether joining two vertices would seal off a group: both are away from the border and
 * neither has more than one exit left.
 */
function formsDeadEnd(board: Board, ax: number, ay: number, bx: number, by: number): boolean {
    return !board.getVertexGroupBorder(ax, ay)
        && !board.getVertexGroupBorder(bx, by)
        && board.getVertexGroupExits(ax, ay) <= 1
        && board.getVertexGroupExits(bx, by) <= 1;
}

/**
 * A cell where exactly one orientation would seal off a vertex group takes the other.
 */
export function deadEndAvoidance(board: Board): boolean {
    let progress = false;
    for (const { x, y } of board.getUnknownCells()) {
        const backslashDead = formsDeadEnd(board, x, y, x + 1, y + 1);
        const slashDead = formsDeadEnd(board, x + 1, y, x, y + 1);
        if (backslashDead && !slashDead) {
            if (place(board, x, y, CellValue.SLASH)) progress = true;
        } else if (slashDead && !backslashDead) {
            if (place(board, x, y, CellValue.BACKSLASH)) progress = true;
        }
    }
    return progress;
}

/**
 * Equivalence tracking in three passes:
 * a clue needing one more touch from two orthogonally adjacent cells makes them equivalent;
 * undecided cells of a determined class take its value;
 * a cell whose classmates cannot take one orientation takes the other.
 */
export function equivalenceClasses(board: Board): boolean {
    let progress = false;

    for (const { vx, vy, clue } of board.getCluedVertices()) {
        const { touches } = board.countTouches(vx, vy);
        if (clue - touches !== 1) continue;
        const cells = unknownAdjacent(board, vx, vy);
        if (cells.length !== 2 || !isOrthogonal(cells[0], cells[1])) continue;
        if (board.markCellsEquivalent(cells[0].x, cells[0].y, cells[1].x, cells[1].y)) progress = true;
    }

    for (const { x, y } of board.getUnknownCells()) {
        const classValue = board.getEquivalenceClassValue(x, y);
        if (classValue === CellValue.UNKNOWN) continue;
        const value = board.wouldFormLoop(x, y, classValue) ? opposite(classValue) : classValue;
        if (place(board, x, y, value)) progress = true;
    }

    for (const { x, y } of board.getUnknownCells()) {
        if (board.getCellValue(x, y) !== CellValue.UNKNOWN) continue;
        const mates = board.getEquivalentCells(x, y)
            .filter(c => !sameCell(c, { x, y }) && board.getCellValue(c.x, c.y) === CellValue.UNKNOWN);
        if (mates.length === 0) continue;

        const slashBlocked = mates.some(c => board.wouldFormLoop(c.x, c.y, CellValue.SLASH));
        const backslashBlocked = mates.some(c => board.wouldFormLoop(c.x, c.y, CellValue.BACKSLASH));
        if (slashBlocked && !backslashBlocked) {
            if (place(board, x, y, CellValue.BACKSLASH)) progress = true;
        } else if (backslashBlocked && !slashBlocked) {
            if (place(board, x, y, CellValue.SLASH)) progress = true;
        }
    }

    return progress;
}

/**
 * Clears the bitmap bits a placed cell rules out, in itself and in its left and upper neighbours.
 */
function clearPlacedBits(board: Board, x: number, y: number): boolean {
    const value = board.getCellValue(x, y);
    if (value === CellValue.UNKNOWN) return false;
    const slash = value === CellValue.SLASH;
    let changed = false;

    if (x > 0 && board.vbitmapClear(x - 1, y, slash ? VBITMAP_UP_V : VBITMAP_DOWN_V)) changed = true;
    if (x + 1 < board.width && board.vbitmapClear(x, y, slash ? VBITMAP_DOWN_V : VBITMAP_UP_V)) changed = true;
    if (y > 0 && board.vbitmapClear(x, y - 1, slash ? VBITMAP_LEFT_V : VBITMAP_RIGHT_V)) changed = true;
    if (y + 1 < board.height && board.vbitmapClear(x, y, slash ? VBITMAP_RIGHT_V : VBITMAP_LEFT_V)) changed = true;

    return changed;
}

/**
 * Merges a cell with its right and lower neighbours where no V shape is left between them.
 */
function mergeParallelPairs(board: Board, x: number, y: number): boolean {
    let changed = false;
    const bits = board.vbitmapGet(x, y);
    if (x + 1 < board.width && (bits & VBITMAP_HORIZONTAL) === 0) {
        if (board.markCellsEquivalent(x, y, x + 1, y)) changed = true;
    }
    if (y + 1 < board.height && (bits & VBITMAP_VERTICAL) === 0) {
        if (board.markCellsEquivalent(x, y, x, y + 1)) changed = true;
    }
    return changed;
}

/**
 * Clears the bitmap bits an interior clue rules out.
 * Around a 1 no V may point at the vertex, around a 3 none may point away,
 * and around a 2 the two pairs on opposite sides must match.
 */
function clearClueBits(board: Board): boolean {
    let changed = false;
    for (let vy = 1; vy < board.height; vy++) {
        for (let vx = 1; vx < board.width; vx++) {
            const clue = board.getClue(vx, vy);
            if (clue === null) continue;
            const tl = { x: vx - 1, y: vy - 1 };
            const bl = { x: vx - 1, y: vy };
            const tr = { x: vx, y: vy - 1 };

            if (clue === 1) {
                if (board.vbitmapClear(tl.x, tl.y, VBITMAP_DOWN_V | VBITMAP_RIGHT_V)) changed = true;
                if (board.vbitmapClear(bl.x, bl.y, VBITMAP_UP_V)) changed = true;
                if (board.vbitmapClear(tr.x, tr.y, VBITMAP_LEFT_V)) changed = true;
            } else if (clue === 3) {
                if (board.vbitmapClear(tl.x, tl.y, VBITMAP_UP_V | VBITMAP_LEFT_V)) changed = true;
                if (board.vbitmapClear(bl.x, bl.y, VBITMAP_DOWN_V)) changed = true;
                if (board.vbitmapClear(tr.x, tr.y, VBITMAP_RIGHT_V)) changed = true;
            } else if (clue === 2) {
                const topH = board.vbitmapGet(tl.x, tl.y) & VBITMAP_HORIZONTAL;
                const bottomH = board.vbitmapGet(bl.x, bl.y) & VBITMAP_HORIZONTAL;
                if (board.vbitmapClear(tl.x, tl.y, VBITMAP_HORIZONTAL ^ bottomH)) changed = true;
                if (board.vbitmapClear(bl.x, bl.y, VBITMAP_HORIZONTAL ^ topH)) changed = true;

                const leftV = board.vbitmapGet(tl.x, tl.y) & VBITMAP_VERTICAL;
                const rightV = board.vbitmapGet(tr.x, tr.y) & VBITMAP_VERTICAL;
                if (board.vbitmapClear(tl.x, tl.y, VBITMAP_VERTICAL ^ rightV)) changed = true;
                if (board.vbitmapClear(tr.x, tr.y, VBITMAP_VERTICAL ^ leftV)) changed = true;
            }
        }
    }
    return changed;
}

/**
 * One sweep of bitmap propagation: placed cells, then cell pair merges, then interior clues.
 */
function bitmapSweep(board: Board): boolean {
    let changed = false;
    for (let y = 0; y < board.height; y++) {
        for (let x = 0; x < board.width; x++) {
            if (clearPlacedBits(board, x, y)) changed = true;
            if (mergeParallelPairs(board, x, y)) changed = true;
        }
    }
    if (clearClueBits(board)) changed = true;
    return changed;
}

/**
 * Runs bitmap propagation to its local fixpoint.
 */
export function vbitmapPropagation(board: Board): boolean {
    let progress = false;
    while (!board.hasConflict() && bitmapSweep(board)) {
        progress = true;
    }
    return progress;
}

interface VertexNeighbour {
    x: number;
    y: number;
    touching: CellValue;
}

/**
 * The cells around a vertex in cyclic order, so consecutive entries (and last with first)
 * are orthogonally adjacent.
 */
function cyclicNeighbours(board: Board, vx: number, vy: number): VertexNeighbour[] {
    const result: VertexNeighbour[] = [];
    if (vx > 0 && vy > 0) result.push({ x: vx - 1, y: vy - 1, touching: CellValue.BACKSLASH });
    if (vx > 0 && vy < board.height) result.push({ x: vx - 1, y: vy, touching: CellValue.SLASH });
    if (vx < board.width && vy < board.height) result.push({ x: vx, y: vy, touching: CellValue.BACKSLASH });
    if (vx < board.width && vy > 0) result.push({ x: vx, y: vy - 1, touching: CellValue.SLASH });
    return result;
}

/**
 * Clue counting where two adjacent undecided neighbours already known to be equivalent
 * count as one touch over two slots.
 */
function unifiedClueCounting(board: Board): boolean {
    let changed = false;
    for (const { vx, vy, clue } of board.getCluedVertices()) {
        const neighbours = cyclicNeighbours(board, vx, vy);
        const n = neighbours.length;

        let undecided = 0;
        let stillNeeded = clue;
        let pair: [VertexNeighbour, VertexNeighbour] | null = null;

        let previous = neighbours[n - 1];
        let previousRoot = board.getCellValue(previous.x, previous.y) === CellValue.UNKNOWN
            ? board.getCellEquivRoot(previous.x, previous.y)
            : -1;

        for (const cell of neighbours) {
            const value = board.getCellValue(cell.x, cell.y);
            if (value === CellValue.UNKNOWN) {
                undecided++;
                if (pair === null) {
                    const root = board.getCellEquivRoot(cell.x, cell.y);
                    if (root === previousRoot && !sameCell(previous, cell)) {
                        // One of an equivalent adjacent pair touches, the other avoids.
                        pair = [previous, cell];
                        stillNeeded--;
                        undecided -= 2;
                    } else {
                        previousRoot = root;
                    }
                }
            } else {
                previousRoot = -1;
                if (value === cell.touching) stillNeeded--;
            }
            previous = cell;
        }

        if (stillNeeded < 0 || stillNeeded > undecided) continue;

        const inPair = (cell: VertexNeighbour) => pair !== null && (sameCell(cell, pair[0]) || sameCell(cell, pair[1]));

        if (undecided > 0 && (stillNeeded === 0 || stillNeeded === undecided)) {
            for (const cell of neighbours) {
                if (inPair(cell) || board.getCellValue(cell.x, cell.y) !== CellValue.UNKNOWN) continue;
                const value = stillNeeded > 0 ? cell.touching : opposite(cell.touching);
                if (place(board, cell.x, cell.y, value)) changed = true;
            }
        } else if (undecided === 2 && stillNeeded === 1) {
            let first = -1;
            for (let i = 0; i < n; i++) {
                const cell = neighbours[i];
                if (inPair(cell) || board.getCellValue(cell.x, cell.y) !== CellValue.UNKNOWN) continue;
                if (first < 0) {
                    first = i;
                } else if (first === i - 1 || (first === 0 && i === n - 1)) {
                    const other = neighbours[first];
                    if (board.markCellsEquivalent(other.x, other.y, cell.x, cell.y)) changed = true;
                    break;
                }
            }
        }
    }
    return changed;
}

/**
 * Per cell: take the class value, and rule out orientations that loop or seal off a group.
 */
function unifiedCellForcing(board: Board): boolean {
    let changed = false;
    for (let y = 0; y < board.height; y++) {
        for (let x = 0; x < board.width; x++) {
            if (board.getCellValue(x, y) !== CellValue.UNKNOWN) continue;

            const classValue = board.getEquivalenceClassValue(x, y);
            let forceSlash = classValue === CellValue.SLASH;
            let forceBackslash = classValue === CellValue.BACKSLASH;

            if (board.getVertexRoot(x, y) === board.getVertexRoot(x + 1, y + 1)) forceSlash = true;
            if (!forceSlash && formsDeadEnd(board, x, y, x + 1, y + 1)) forceSlash = true;

            if (board.getVertexRoot(x + 1, y) === board.getVertexRoot(x, y + 1)) forceBackslash = true;
            if (!forceBackslash && formsDeadEnd(board, x + 1, y, x, y + 1)) forceBackslash = true;

            if (forceSlash === forceBackslash) continue;
            if (place(board, x, y, forceSlash ? CellValue.SLASH : CellValue.BACKSLASH)) changed = true;
        }
    }
    return changed;
}

/**
 * Combined deduction run to its own fixpoint. Each phase restarts from the first when it
 * changes anything: clue counting with equivalent pairs, per-cell forcing, then bitmaps.
 */
export function unifiedDeduction(board: Board): boolean {
    let progress = false;
    while (!board.hasConflict()) {
        if (unifiedClueCounting(board) || unifiedCellForcing(board) || bitmapSweep(board)) {
            progress = true;
            continue;
        }
        break;
    }
    return progress;
}

// --- Tier 3 ---

/**
 * Whether a placement touching a clued vertex would over-touch it, or one avoiding it would
 * leave too few cells to reach it.
 */
function violatesCorner(board: Board, vx: number, vy: number, touches: boolean): boolean {
    const clue = board.getClue(vx, vy);
    if (clue === null) return false;
    const count = board.countTouches(vx, vy);
    if (touches) return count.touches + 1 > clue;
    return count.touches + Math.max(0, count.unknown - 1) < clue;
}

function orientationViolates(board: Board, x: number, y: number, value: CellValue): boolean {
    if (board.wouldFormLoop(x, y, value)) return true;
    const slash = value === CellValue.SLASH;
    return violatesCorner(board, x, y + 1, slash)
        || violatesCorner(board, x + 1, y, slash)
        || violatesCorner(board, x, y, !slash)
        || violatesCorner(board, x + 1, y + 1, !slash);
}

/**
 * Tries each orientation against the clues at the cell's corners; if only one survives, place it.
 */
export function trialClueViolation(board: Board): boolean {
    let progress = false;
    for (const { x, y } of board.getUnknownCells()) {
        const slashOk = !orientationViolates(board, x, y, CellValue.SLASH);
        const backslashOk = !orientationViolates(board, x, y, CellValue.BACKSLASH);
        if (slashOk && !backslashOk) {
            if (place(board, x, y, CellValue.SLASH)) progress = true;
        } else if (backslashOk && !slashOk) {
            if (place(board, x, y, CellValue.BACKSLASH)) progress = true;
        }
    }
    return progress;
}

/**
 * Whether placing a value would leave some other undecided cell with both orientations looping.
 * Reads the union-find as if the value's two vertices were joined, without placing it.
 */
function strandsAnotherCell(board: Board, x: number, y: number, value: CellValue): boolean {
    const [a, b] = value === CellValue.SLASH
        ? [board.getVertexRoot(x, y + 1), board.getVertexRoot(x + 1, y)]
        : [board.getVertexRoot(x, y), board.getVertexRoot(x + 1, y + 1)];

    const joined = (r1: number, r2: number) =>
        r1 === r2 || (r1 === a && r2 === b) || (r1 === b && r2 === a);

    for (const cell of board.getUnknownCells()) {
        if (cell.x === x && cell.y === y) continue;
        const slashLoops = joined(board.getVertexRoot(cell.x, cell.y + 1), board.getVertexRoot(cell.x + 1, cell.y));
        const backslashLoops = joined(board.getVertexRoot(cell.x, cell.y), board.getVertexRoot(cell.x + 1, cell.y + 1));
        if (slashLoops && backslashLoops) return true;
    }
    return false;
}

/**
 * Looks one placement ahead: an orientation that leaves another cell with no loop-free
 * option is ruled out.
 */
export function oneStepLookahead(board: Board): boolean {
    let progress = false;
    for (const { x, y } of board.getUnknownCells()) {
        if (board.getCellValue(x, y) !== CellValue.UNKNOWN) continue;
        const slashBad = board.wouldFormLoop(x, y, CellValue.SLASH) || strandsAnotherCell(board, x, y, CellValue.SLASH);
        const backslashBad = board.wouldFormLoop(x, y, CellValue.BACKSLASH) || strandsAnotherCell(board, x, y, CellValue.BACKSLASH);
        if (slashBad && !backslashBad) {
            if (place(board, x, y, CellValue.BACKSLASH)) progress = true;
        } else if (backslashBad && !slashBad) {
            if (place(board, x, y, CellValue.SLASH)) progress = true;
        }
    }
    return progress;
}

/**
 * Every rule, cheapest first. Tier 3 rules are last, so they only run once everything
 * cheaper is stuck.
 */
export const DEFAULT_RULES: readonly Rule[] = Object.freeze([
    { name: 'clue_finish_b', score: 1, tier: 1, apply: clueFinishB },
    { name: 'clue_finish_a', score: 2, tier: 1, apply: clueFinishA },
    { name: 'no_loops', score: 2, tier: 1, apply: noLoops },
    { name: 'edge_clue_constraints', score: 2, tier: 2, apply: edgeClueConstraints },
    { name: 'border_two_v_shape', score: 3, tier: 2, apply: borderTwoVShape },
    { name: 'loop_avoidance_2', score: 5, tier: 1, apply: loopAvoidance2 },
    { name: 'v_pattern_with_three', score: 6, tier: 2, apply: vPatternWithThree },
    { name: 'adjacent_ones', score: 8, tier: 2, apply: adjacentOnes },
    { name: 'adjacent_threes', score: 8, tier: 2, apply: adjacentThrees },
    { name: 'dead_end_avoidance', score: 9, tier: 2, apply: deadEndAvoidance },
    { name: 'equivalence_classes', score: 9, tier: 2, apply: equivalenceClasses },
    { name: 'vbitmap_propagation', score: 9, tier: 2, apply: vbitmapPropagation },
    { name: 'unified_deduction', score: 9, tier: 2, apply: unifiedDeduction },
    { name: 'trial_clue_violation', score: 10, tier: 3, apply: trialClueViolation },
    { name: 'one_step_lookahead', score: 15, tier: 3, apply: oneStepLookahead },
] satisfies Rule[]);
