export type ValuationErrorCode =
    | 'INVALID_SCHEDULE'
    | 'INVALID_RATE_RELATIONSHIP'
    | 'INVALID_SHARE_COUNT'
    | 'INVALID_CAPITAL_STRUCTURE'
    | 'INVALID_AXIS'
    | 'INVALID_ASSUMPTIONS';

export class ValuationError extends Error {
    constructor(
        public code: ValuationErrorCode,
        message: string
    ) {
        super(message);
        this.name = 'ValuationError';
    }
}

export const isValuationError = (error: unknown, code?: ValuationErrorCode): error is ValuationError => {
    if (!(error instanceof ValuationError)) return false;
    return code === undefined || error.code === code;
};
