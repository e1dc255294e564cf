import type { Statement } from "@polka/stack";

function printLeaf(stmt: Statement): string {
    switch (stmt.type) {
        case 'const':
            return stmt.value.toString();

        case 'binop':
            return stmt.op;

        case 'abs':
        case 'dup':
        case 'input':
            return stmt.type;

        case 'empty':
        case 'combine':
            return '';
    }
}

export function printStatement(stmt: Statement): string {
    const words: string[] = [];
    // листья в порядке выполнения, без рекурсии
    const pending: Statement[] = [stmt];

    for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
        if (node.type === 'combine') {
            pending.push(node.right, node.left);
            continue;
        }

        const word = printLeaf(node);
        // пустые части не дают лишних пробелов
        if (word !== '') {
            words.push(word);
        }
    }

    return words.join(' ');
}
