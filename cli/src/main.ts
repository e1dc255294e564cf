import { run } from "./run";
import { stdinInput } from "./stdin";

// stdin читается только если программа выполнит input
process.exitCode = run(process.argv.slice(2), {
    out: line => console.log(line),
    err: line => console.error(line),
    input: stdinInput(),
});
