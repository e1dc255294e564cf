import { readFileSync } from "fs";
import { PolkaError, textInput } from "@polka/stack";
import type { InputSource } from "@polka/stack";

/**
 * Input for `input` from standard input. The first read consumes stdin up to
 * EOF, so an interactive session ends its values with Ctrl-D.
 */
export function stdinInput(read: () => string = () => readFileSync(0, "utf8")): InputSource {
    return textInput(() => {
        try {
            return read();
        } catch (e) {
            // EAGAIN, закрытый дескриптор и т. п.
            const reason = e instanceof Error ? e.message : String(e);
            throw new PolkaError(`Cannot read standard input: ${reason}`, 'INPUT_UNAVAILABLE');
        }
    });
}
