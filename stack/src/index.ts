export {
    constant,
    binaryOp,
    combine,
    sequence,
    stackEffect,
    ABS,
    DUP,
    INPUT,
    EMPTY,
} from "./statement";
export type {
    Statement,
    StackEffect,
    Constant,
    BinaryOp,
    AbsoluteValue,
    Duplicate,
    ReadInput,
    Empty,
    Combine,
} from "./statement";

export { apply } from "./apply";
export type { InputSource } from "./apply";
export { arrayInput, textInput } from "./input";
export { isLiteral, parseInt32 } from "./int32";
export type { BinaryOperator } from "./int32";
export { PolkaError } from "./errors";
export type { PolkaErrorCode } from "./errors";
