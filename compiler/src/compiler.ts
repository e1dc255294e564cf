import { ABS, binaryOp, combine, constant, DUP, EMPTY, INPUT } from "@polka/stack";
import type { Statement } from "@polka/stack";
import { optimize } from "@polka/optimizer";
import { tokenize } from "./tokenizer";
import type { Keyword, Token } from "./tokenizer";

export interface CompileOptions {
    // свернуть константы после компиляции
    optimize?: boolean;
}

// Примитивы без состояния разделяются всеми деревьями
const operators: { readonly [word in Keyword]: Statement } = {
    '+': binaryOp('+'),
    '-': binaryOp('-'),
    '*': binaryOp('*'),
    '/': binaryOp('/'),
    '%': binaryOp('%'),
    'abs': ABS,
    'input': INPUT,
    'dup': DUP,
};

function toStatement(token: Token): Statement {
    switch (token.type) {
        case 'literal':
            return constant(token.value);
        case 'keyword':
            return operators[token.word];
    }
}

export function compile(source: string, options: CompileOptions = {}): Statement {
    let program: Statement | null = null;

    for (const token of tokenize(source)) {
        const stmt = toStatement(token);
        program = program === null ? stmt : combine(program, stmt);
    }

    if (program === null) {
        return EMPTY;
    }
    return options.optimize ? optimize(program) : program;
}
