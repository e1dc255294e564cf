import { apply, combine, constant, PolkaError } from "@polka/stack";
import type { Combine, Statement } from "@polka/stack";

/**
 * Constant folding. A composite folds into one constant when it is pure,
 * takes nothing from the stack and leaves exactly one value: `6 1 +` becomes
 * `7`, while `6 1` on its own stays two pushes.
 *
 * Returns a new tree; subtrees that do not change are shared with the input.
 */
export function optimize(stmt: Statement): Statement {
    // обход снизу вверх без рекурсии: дерево длинной программы очень глубокое
    const optimized = new Map<Combine, Statement>();
    const resultOf = (node: Statement): Statement | undefined =>
        node.type === 'combine' ? optimized.get(node) : node;

    const pending: Statement[] = [stmt];
    while (pending.length > 0) {
        const node = pending[pending.length - 1];
        if (node.type !== 'combine' || optimized.has(node)) {
            pending.pop();
            continue;
        }

        const left = resultOf(node.left);
        const right = resultOf(node.right);
        if (left === undefined || right === undefined) {
            if (right === undefined) pending.push(node.right);
            if (left === undefined) pending.push(node.left);
            continue;
        }

        pending.pop();
        optimized.set(node, rewrite(node, left, right));
    }

    return resultOf(stmt) ?? stmt;
}

function rewrite(stmt: Combine, left: Statement, right: Statement): Statement {
    // правой части не хватает значений слева, не сворачиваем
    if (right.arguments > left.results) {
        return stmt;
    }

    const candidate = left === stmt.left && right === stmt.right
        ? stmt
        : combine(left, right);

    return fold(candidate) ?? candidate;
}

function fold(stmt: Combine): Statement | null {
    if (!stmt.pure || stmt.arguments !== 0 || stmt.results !== 1) {
        return null;
    }

    try {
        const [value] = apply(stmt, []);
        return constant(value);
    } catch (e) {
        // деление на ноль должно случиться при выполнении, а не при компиляции
        if (e instanceof PolkaError && e.code === 'DIVISION_BY_ZERO') {
            return null;
        }
        throw e;
    }
}
