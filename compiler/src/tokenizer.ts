import { readFileSync } from "fs";
import { grammar } from "ohm-js";
import type { ActionDict, Dict, MatchResult, Node, Semantics } from "ohm-js";
import { parseInt32 } from "@polka/stack";

// Грамматика принимает любую строку: всё, что не литерал, — слово
export const polkaGrammar = grammar(readFileSync(new URL("./polka.ohm", import.meta.url), "utf8"));

export const KEYWORDS = ['+', '-', '*', '/', '%', 'abs', 'input', 'dup'] as const;

export type Keyword = typeof KEYWORDS[number];

const keywords: ReadonlySet<string> = new Set(KEYWORDS);

export function isKeyword(word: string): word is Keyword {
    return keywords.has(word);
}

export type Token = LiteralToken | KeywordToken;

export interface LiteralToken {
    type: 'literal';
    value: number;
}

export interface KeywordToken {
    type: 'keyword';
    word: Keyword;
}

const tokenActions = {
    literal(_sign: Node, _digits: Node): Token {
        return { type: 'literal', value: parseInt32(this.sourceString) };
    },

    // неизвестные слова молча пропускаются
    word(_chars: Node): Token | null {
        const word = this.sourceString;
        return isKeyword(word) ? { type: 'keyword', word } : null;
    }
} satisfies ActionDict<Token | null>;

const streamActions = {
    Program(tokens: Node): Iterable<Token> {
        return streamTokens(tokens.children);
    }
} satisfies ActionDict<Iterable<Token>>;

function* streamTokens(nodes: Node[]): Generator<Token> {
    for (const node of nodes) {
        const token: Token | null = node.token();
        if (token !== null) {
            yield token;
        }
    }
}

export const polkaSemantics: PolkaSemantics = polkaGrammar.createSemantics() as PolkaSemantics;
polkaSemantics.addOperation<Token | null>("token()", tokenActions);
polkaSemantics.addOperation<Iterable<Token>>("tokens()", streamActions);

interface PolkaActions extends Dict {
    tokens(): Iterable<Token>;
}

interface PolkaSemantics extends Semantics {
    (match: MatchResult): PolkaActions;
}

// Сопоставление не проваливается: слово — любая последовательность не-пробелов
export function parse(source: string): MatchResult {
    return polkaGrammar.match(source);
}

/**
 * Lazily yields the recognised tokens of `source`, left to right. Only the
 * space character separates words.
 */
export function* tokenize(source: string): Generator<Token> {
    yield* polkaSemantics(parse(source)).tokens();
}
