import { wrap } from "./int32";
import type { BinaryOperator } from "./int32";

export type Statement =
    | Constant
    | BinaryOp
    | AbsoluteValue
    | Duplicate
    | ReadInput
    | Empty
    | Combine;

// Статическая информация о действии на стек
export interface StackEffect {
    // сколько значений должно лежать на стеке до apply
    readonly arguments: number;
    // сколько значений оставляет после себя
    readonly results: number;
    // false, если где-то в поддереве читается ввод
    readonly pure: boolean;
}

export interface Constant extends StackEffect {
    readonly type: 'const';
    readonly value: number;
}

export interface BinaryOp extends StackEffect {
    readonly type: 'binop';
    readonly op: BinaryOperator;
}

export interface AbsoluteValue extends StackEffect {
    readonly type: 'abs';
}

export interface Duplicate extends StackEffect {
    readonly type: 'dup';
}

export interface ReadInput extends StackEffect {
    readonly type: 'input';
}

export interface Empty extends StackEffect {
    readonly type: 'empty';
}

export interface Combine extends StackEffect {
    readonly type: 'combine';
    readonly left: Statement;
    readonly right: Statement;
}

export function constant(value: number): Constant {
    return { type: 'const', value: wrap(value), arguments: 0, results: 1, pure: true };
}

const binaryOps: { readonly [op in BinaryOperator]: BinaryOp } = {
    '+': { type: 'binop', op: '+', arguments: 2, results: 1, pure: true },
    '-': { type: 'binop', op: '-', arguments: 2, results: 1, pure: true },
    '*': { type: 'binop', op: '*', arguments: 2, results: 1, pure: true },
    '/': { type: 'binop', op: '/', arguments: 2, results: 1, pure: true },
    '%': { type: 'binop', op: '%', arguments: 2, results: 1, pure: true },
};

export function binaryOp(op: BinaryOperator): BinaryOp {
    return binaryOps[op];
}

export const ABS: AbsoluteValue = { type: 'abs', arguments: 1, results: 1, pure: true };
export const DUP: Duplicate = { type: 'dup', arguments: 1, results: 2, pure: true };
export const INPUT: ReadInput = { type: 'input', arguments: 0, results: 1, pure: false };
export const EMPTY: Empty = { type: 'empty', arguments: 0, results: 0, pure: true };

/**
 * Sequential composition: `right` runs on whatever `left` leaves behind.
 *
 * Left's outputs feed right's inputs first; right's unmet inputs become extra
 * arguments of the pair, left's unconsumed outputs stay underneath right's.
 * Children are held by reference, never copied.
 */
export function combine(left: Statement, right: Statement): Combine {
    return {
        type: 'combine',
        left,
        right,
        arguments: left.arguments + Math.max(right.arguments - left.results, 0),
        results: right.results + Math.max(left.results - right.arguments, 0),
        pure: left.pure && right.pure,
    };
}

export function sequence(...statements: Statement[]): Statement {
    if (statements.length === 0) {
        return EMPTY;
    }

    let result = statements[0];
    for (let i = 1; i < statements.length; i++) {
        result = combine(result, statements[i]);
    }
    return result;
}

export function stackEffect(stmt: Statement): StackEffect {
    return { arguments: stmt.arguments, results: stmt.results, pure: stmt.pure };
}
