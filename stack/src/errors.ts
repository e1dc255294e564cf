export type PolkaErrorCode =
    | 'PRECONDITION_VIOLATION'
    | 'DIVISION_BY_ZERO'
    | 'INPUT_UNAVAILABLE'
    | 'INPUT_EXHAUSTED'
    | 'INVALID_INPUT';

export class PolkaError extends Error {
    constructor(message: string, public readonly code: PolkaErrorCode) {
        super(message);
        this.name = 'PolkaError';
    }
}
