import { PolkaError } from "./errors";
import { abs, arithmetic } from "./int32";
import type { Statement } from "./statement";

export interface InputSource {
    readInt(): number;
}

/**
 * Runs `stmt` over a copy of `stack` (bottom first) and returns the new stack.
 * The caller's array is never touched.
 *
 * Every node checks its own argument count before running and throws
 * `PRECONDITION_VIOLATION` on underflow.
 */
export function apply(stmt: Statement, stack: readonly number[], input?: InputSource): number[] {
    const owned = stack.slice();
    execute(stmt, owned, input);
    return owned;
}

function execute(stmt: Statement, stack: number[], input: InputSource | undefined): void {
    // явный стек работ: длинная программа — глубокое дерево
    const pending: Statement[] = [stmt];

    while (pending.length > 0) {
        const node = pending.pop();
        if (node === undefined) {
            return;
        }
        step(node, stack, input, pending);
    }
}

function step(stmt: Statement, stack: number[], input: InputSource | undefined, pending: Statement[]): void {
    if (stack.length < stmt.arguments) {
        throw new PolkaError(
            `Stack underflow: '${stmt.type}' needs ${stmt.arguments} value(s), stack has ${stack.length}`,
            'PRECONDITION_VIOLATION'
        );
    }

    switch (stmt.type) {
        case 'const':
            stack.push(stmt.value);
            return;

        case 'binop': {
            // верхний элемент — правый операнд
            const b = pop(stack);
            const a = pop(stack);
            stack.push(arithmetic[stmt.op](a, b));
            return;
        }

        case 'abs':
            stack.push(abs(pop(stack)));
            return;

        case 'dup':
            stack.push(stack[stack.length - 1]);
            return;

        case 'input':
            if (input === undefined) {
                throw new PolkaError('Program reads input but no input source was given', 'INPUT_UNAVAILABLE');
            }
            stack.push(input.readInt());
            return;

        case 'empty':
            return;

        case 'combine':
            // left снимается со стека первым
            pending.push(stmt.right, stmt.left);
            return;
    }
}

function pop(stack: number[]): number {
    const value = stack.pop();
    if (value === undefined) {
        throw new PolkaError('Stack underflow', 'PRECONDITION_VIOLATION');
    }
    return value;
}
