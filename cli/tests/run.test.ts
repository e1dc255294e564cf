import { describe, it, expect } from 'vitest';
import { arrayInput } from '@polka/stack';
import { USAGE, run } from '../src';
import type { CliIO } from '../src';

function fakeIO(inputs: number[] = []): CliIO & { stdout: string[]; stderr: string[] } {
    const stdout: string[] = [];
    const stderr: string[] = [];
    return {
        stdout,
        stderr,
        out: line => stdout.push(line),
        err: line => stderr.push(line),
        input: arrayInput(inputs),
    };
}

describe('run', () => {
    it('prints the resulting stack', () => {
        const io = fakeIO();
        expect(run(['1 2 +'], io)).toBe(0);
        expect(io.stdout).toEqual(['3']);
        expect(io.stderr).toEqual([]);
    });

    it('starts from the values given after the expression', () => {
        const io = fakeIO();
        expect(run(['-', '1', '-5'], io)).toBe(0);
        expect(io.stdout).toEqual(['6']);
    });

    it('prints every value left on the stack, bottom first', () => {
        const io = fakeIO();
        run(['dup 1 +', '9', '4'], io);
        expect(io.stdout).toEqual(['9 4 5']);
    });

    it('reads input values when the program asks for them', () => {
        const io = fakeIO([21]);
        expect(run(['input 2 *'], io)).toBe(0);
        expect(io.stdout).toEqual(['42']);
    });

    it('explains the compiled program', () => {
        const io = fakeIO();
        run(['--explain', '6 1 + dup'], io);
        expect(io.stdout).toEqual(['program: 6 1 + dup', 'effect: 0 -> 2, pure', '7 7']);
    });

    it('explains the folded program with --optimize', () => {
        const io = fakeIO([3]);
        run(['--optimize', '--explain', '6 1 + input'], io);
        expect(io.stdout).toEqual(['program: 7 input', 'effect: 0 -> 2, impure', '7 3']);
    });

    it('prints usage without an expression', () => {
        const io = fakeIO();
        expect(run([], io)).toBe(2);
        expect(io.stderr).toEqual([USAGE]);
        expect(io.stdout).toEqual([]);
    });

    it('rejects unknown options', () => {
        const io = fakeIO();
        expect(run(['--fast', '1'], io)).toBe(2);
        expect(io.stderr).toEqual(["Unknown option '--fast'", USAGE]);
    });

    it('reports stack underflow', () => {
        const io = fakeIO();
        expect(run(['1 +'], io)).toBe(1);
        expect(io.stderr).toEqual(["Stack underflow: 'combine' needs 1 value(s), stack has 0"]);
        expect(io.stdout).toEqual([]);
    });

    it('reports bad initial values', () => {
        const io = fakeIO();
        expect(run(['+', 'x', '1'], io)).toBe(1);
        expect(io.stderr).toEqual(["Not an integer literal: 'x'"]);
    });

    it('reports division by zero', () => {
        const io = fakeIO();
        expect(run(['1 0 /'], io)).toBe(1);
        expect(io.stderr).toEqual(['Division by zero']);
    });

    it('reports missing input', () => {
        const io = fakeIO();
        expect(run(['input'], io)).toBe(1);
        expect(io.stderr).toEqual(['Input exhausted']);
    });
});

describe('run on long programs', () => {
    const source = '0' + ' 1 +'.repeat(100000);

    it('evaluates 200001 tokens', () => {
        const io = fakeIO();
        expect(run([source], io)).toBe(0);
        expect(io.stdout).toEqual(['100000']);
    });

    it('evaluates them optimized', () => {
        const io = fakeIO();
        expect(run(['--optimize', source], io)).toBe(0);
        expect(io.stdout).toEqual(['100000']);
    });
});
