import { Clue } from '../types';
import { MalformedGivensError } from '../errors';

const MAX_RUN = 26;
const RUN_BASE = 'a'.charCodeAt(0);

/**
 * Decodes a run-length givens string into one entry per vertex, row-major.
 *
 * Digits 0-4 are clues. Lowercase letters are runs of unclued vertices
 * ('a' = 1 ... 'z' = 26); longer runs are written as consecutive letters.
 *
 * @param givens - The encoded givens.
 * @returns The clue of each vertex, or null where the vertex is unclued.
 * @throws {MalformedGivensError} If the string contains any other character.
 */
export function decodeGivens(givens: string): Clue[] {
    const clues: Clue[] = [];
    for (let i = 0; i < givens.length; i++) {
        const ch = givens[i];
        if (ch >= '0' && ch <= '4') {
            clues.push(ch.charCodeAt(0) - 48);
        } else if (ch >= 'a' && ch <= 'z') {
            const run = ch.charCodeAt(0) - RUN_BASE + 1;
            for (let r = 0; r < run; r++) clues.push(null);
        } else {
            throw new MalformedGivensError(`Unexpected character '${ch}' at position ${i} of givens.`, -1, -1);
        }
    }
    return clues;
}

/**
 * Encodes per-vertex clues back into the run-length givens form.
 * Unclued runs are written greedily, so a run of 30 becomes 'zd'.
 *
 * @param clues - One entry per vertex, row-major.
 */
export function encodeGivens(clues: readonly Clue[]): string {
    let out = '';
    let run = 0;

    const flush = () => {
        while (run > 0) {
            const n = Math.min(run, MAX_RUN);
            out += String.fromCharCode(RUN_BASE + n - 1);
            run -= n;
        }
    };

    for (const clue of clues) {
        if (clue === null) {
            run++;
        } else {
            flush();
            out += String(clue);
        }
    }
    flush();

    return out;
}
