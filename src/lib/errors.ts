/**
 * Fatal conditions of a mirror selection run.
 *
 * - `precondition`: missing privilege or undiscoverable distribution, nothing was touched yet
 * - `unsupported`: distribution family without catalog entries, nothing was touched yet
 * - `backup`: the backup set could not be written, nothing was touched yet
 * - `clean`: primary file or drop-ins could not be removed, the state is ambiguous and no rollback is tried
 * - `write`: the primary file could not be written, no rollback is tried
 * - `verify`: the written file did not pass verification, no rollback is tried
 * - `refresh`: the package index refresh failed, the backup was restored
 * - `state`: a transaction step was invoked out of order
 */
export type FailureKind =
    "precondition" | "unsupported" | "backup" | "clean" | "write" | "verify" | "refresh" | "state";

export class MirrorSelectionError extends Error {
    readonly kind: FailureKind;

    constructor(kind: FailureKind, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "MirrorSelectionError";
        this.kind = kind;
    }
}
