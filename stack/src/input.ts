import type { InputSource } from "./apply";
import { PolkaError } from "./errors";
import { isLiteral, parseInt32 } from "./int32";

export function arrayInput(values: readonly number[]): InputSource {
    let next = 0;
    return {
        readInt() {
            if (next >= values.length) {
                throw new PolkaError('Input exhausted', 'INPUT_EXHAUSTED');
            }
            return values[next++];
        }
    };
}

/**
 * Whitespace-separated integers. A thunk is called on the first read only,
 * so a blocking read (stdin) happens just when a program asks for input.
 */
export function textInput(text: string | (() => string)): InputSource {
    let words: string[] | undefined;
    let next = 0;

    return {
        readInt() {
            if (words === undefined) {
                const source = typeof text === 'string' ? text : text();
                words = source.split(/\s+/).filter(word => word.length > 0);
            }
            if (next >= words.length) {
                throw new PolkaError('Input exhausted', 'INPUT_EXHAUSTED');
            }

            const word = words[next++];
            if (!isLiteral(word)) {
                throw new PolkaError(`Expected an integer on input, got '${word}'`, 'INVALID_INPUT');
            }
            return parseInt32(word);
        }
    };
}
