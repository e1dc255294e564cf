export { compile } from "./compiler";
export type { CompileOptions } from "./compiler";
export { tokenize, parse, isKeyword, KEYWORDS, polkaGrammar } from "./tokenizer";
export type { Token, LiteralToken, KeywordToken, Keyword } from "./tokenizer";
export { printStatement } from "./printStatement";
