import type { ZodIssue } from 'zod';
import type { State } from './core/statemachine.js';

/**
 * Raised in strict mode when a significant character is outside the
 * accepted set of the current state. The character is not applied.
 */
export class StreamSyntaxError extends SyntaxError {
    readonly char: string;
    readonly expected: readonly string[];
    readonly state: State;
    /** Zero-based index of the character in the whole input */
    readonly position: number;

    constructor(char: string, expected: readonly string[], state: State, position: number) {
        const choices = expected.map(c => JSON.stringify(c)).join(', ');
        super(`Unexpected ${JSON.stringify(char)} at position ${position} in state ${state}; expected one of ${choices}`);
        this.name = 'StreamSyntaxError';
        this.char = char;
        this.expected = expected;
        this.state = state;
        this.position = position;
    }
}

/**
 * Raised when an options object does not match its schema.
 */
export class InvalidOptionsError extends Error {
    readonly issues: readonly ZodIssue[];

    constructor(issues: readonly ZodIssue[]) {
        const lines = issues.map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`);
        super(`Invalid options: ${lines.join('; ')}`);
        this.name = 'InvalidOptionsError';
        this.issues = issues;
    }
}
