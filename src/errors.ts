import { CellValue } from './types';

/**
 * Base error class for the Slants solver library.
 */
export class SlantsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SlantsError';
    }
}

/**
 * Thrown when the provided configuration is invalid (e.g., non-positive board size, bad tier).
 */
export class ConfigurationError extends SlantsError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when a givens string cannot describe the requested board.
 */
export class MalformedGivensError extends SlantsError {
    /** The vertex count the board needs, (width + 1) * (height + 1). */
    public readonly expected: number;
    /** The vertex count the givens string decoded to, or -1 if decoding stopped on a bad character. */
    public readonly actual: number;

    constructor(message: string, expected: number, actual: number) {
        super(message);
        this.name = 'MalformedGivensError';
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * Describes a placement that would close a loop of diagonals.
 * Returned inside a PlacementResult rather than thrown: callers usually try the other orientation.
 */
export class LoopFormedError extends SlantsError {
    constructor(public readonly x: number, public readonly y: number, public readonly value: CellValue) {
        super(`Placing ${value === CellValue.SLASH ? '/' : '\\'} at (${x},${y}) would form a loop`);
        this.name = 'LoopFormedError';
    }
}

/**
 * Thrown by a Board checking against a known answer when a placement disagrees with it.
 */
export class KnownSolutionMismatchError extends SlantsError {
    constructor(
        public readonly x: number,
        public readonly y: number,
        public readonly value: CellValue,
        public readonly expected: CellValue,
    ) {
        super(`Cell (${x},${y}): placed ${cellChar(value)} but known value is ${cellChar(expected)}`);
        this.name = 'KnownSolutionMismatchError';
    }
}

function cellChar(value: CellValue): string {
    switch (value) {
        case CellValue.SLASH: return '/';
        case CellValue.BACKSLASH: return '\\';
        default: return '.';
    }
}
