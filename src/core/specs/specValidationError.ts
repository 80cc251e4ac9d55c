// src/core/specs/specValidationError.ts

/**
 * Raised when a spec value object is built from parameters outside their allowed domain.
 */
export class SpecValidationError extends Error {
    constructor(
        readonly field: string,
        message: string,
    ) {
        super(`Invalid ${field}: ${message}`);
        this.name = 'SpecValidationError';
    }
}
