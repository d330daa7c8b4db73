// src/core/errors.ts

export interface IErrorContext {
    file?: string;
    stage?: string;
    cause?: unknown;
}

/**
 * Base class for every failure raised while producing an icon. Carries the file and
 * pipeline stage so the batch driver can report it and carry on with the next file.
 */
export class IconForgeError extends Error {
    file?: string;
    stage?: string;

    constructor(message: string, context: IErrorContext = {}) {
        super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
        this.name = new.target.name;
        this.file = context.file;
        this.stage = context.stage;
    }

    /**
     * Fills in the file and stage when the thrower did not know them.
     */
    withContext(context: IErrorContext): this {
        this.file ??= context.file;
        this.stage ??= context.stage;
        return this;
    }
}

/** The source image (or a container being read back) could not be decoded. */
export class DecodeError extends IconForgeError {}

/** An invariant was violated while building a bitmap blob or the container. */
export class EncodeError extends IconForgeError {}

/** Persisting the container failed. */
export class WriteError extends IconForgeError {}

export class ConfigurationError extends IconForgeError {}

/**
 * Extracts a message from anything that was thrown.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
