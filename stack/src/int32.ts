import { PolkaError } from "./errors";

// Вся арифметика — 32-битная, с переполнением по модулю 2^32
export type BinaryOperator = '+' | '-' | '*' | '/' | '%';

export const wrap = (value: number): number => value | 0;

const literalPattern = /^[+-]?[0-9]+$/;

export function isLiteral(text: string): boolean {
    return literalPattern.test(text);
}

/**
 * Parses `[+-]?[0-9]+` into an int32. Digits past the 32-bit range wrap
 * around instead of losing precision.
 */
export function parseInt32(text: string): number {
    if (!isLiteral(text)) {
        throw new PolkaError(`Not an integer literal: '${text}'`, 'INVALID_INPUT');
    }

    const negative = text[0] === '-';
    const digitsFrom = text[0] === '-' || text[0] === '+' ? 1 : 0;

    let value = 0;
    for (let i = digitsFrom; i < text.length; i++) {
        value = wrap(Math.imul(value, 10) + (text.charCodeAt(i) - 48));
    }
    return negative ? wrap(-value) : value;
}

function checkDivisor(b: number): void {
    if (b === 0) {
        throw new PolkaError('Division by zero', 'DIVISION_BY_ZERO');
    }
}

export const arithmetic: { readonly [op in BinaryOperator]: (a: number, b: number) => number } = {
    '+': (a, b) => wrap(a + b),
    '-': (a, b) => wrap(a - b),
    '*': (a, b) => Math.imul(a, b),
    '/': (a, b) => {
        checkDivisor(b);
        return wrap(Math.trunc(a / b));
    },
    '%': (a, b) => {
        checkDivisor(b);
        return wrap(a % b);
    },
};

export const abs = (value: number): number => wrap(Math.abs(value));
