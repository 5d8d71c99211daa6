/**
 * Broad categories for errors raised by the matching library.
 */
export enum MatchingErrorType {
    Generic = 'generic',
    Configuration = 'configuration',
    NotFound = 'not-found',
}

/**
 * Error thrown for programming and configuration faults. The matching flow itself
 * degrades to empty results instead of throwing this to its caller.
 */
export class MatchingError extends Error {
    constructor(
        message: string,
        public readonly type: MatchingErrorType = MatchingErrorType.Generic
    ) {
        super(message)
        this.name = 'MatchingError'
    }
}
