/**
 * Raised when account parameters cannot be resolved into a plan.
 * No operations are produced for an account that fails validation.
 */
export class ValidationError extends Error {
    /** Parameter path the failure refers to, e.g. "ensure" or "ssh_keys.laptop.key" */
    readonly field: string;

    constructor(field: string, message: string) {
        super(message);
        this.name = "ValidationError";
        this.field = field;
    }
}

export function isValidationError(err: unknown): err is ValidationError {
    return err instanceof ValidationError;
}
