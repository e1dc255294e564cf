import { compile, printStatement } from "@polka/compiler";
import { apply, parseInt32, PolkaError } from "@polka/stack";
import type { InputSource } from "@polka/stack";

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
    input: InputSource;
}

export const USAGE = "usage: polka [--optimize] [--explain] <expression> [value ...]";

const FLAGS = new Set(["--optimize", "--explain"]);

/**
 * Compiles the expression, applies it to the stack given by the remaining
 * arguments (bottom first) and prints the result. Returns the exit code.
 */
export function run(argv: readonly string[], io: CliIO): number {
    const flags = argv.filter(arg => arg.startsWith("--"));
    const positional = argv.filter(arg => !arg.startsWith("--"));
    const expression: string | undefined = positional[0];
    const values = positional.slice(1);

    const unknown = flags.find(flag => !FLAGS.has(flag));
    if (unknown !== undefined) {
        io.err(`Unknown option '${unknown}'`);
        io.err(USAGE);
        return 2;
    }
    if (expression === undefined) {
        io.err(USAGE);
        return 2;
    }

    try {
        const stack = values.map(value => parseInt32(value));
        const program = compile(expression, { optimize: flags.includes("--optimize") });

        if (flags.includes("--explain")) {
            io.out(`program: ${printStatement(program)}`);
            io.out(`effect: ${program.arguments} -> ${program.results}, ${program.pure ? "pure" : "impure"}`);
        }

        io.out(apply(program, stack, io.input).join(" "));
        return 0;
    } catch (e) {
        if (e instanceof PolkaError) {
            io.err(e.message);
            return 1;
        }
        throw e;
    }
}
