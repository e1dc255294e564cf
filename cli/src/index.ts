export { run, USAGE } from "./run";
export type { CliIO } from "./run";
export { stdinInput } from "./stdin";
