export type TerminalErrorCode =
    | "BLOCKED"
    | "TIMEOUT"
    | "SPAWN_FAILURE"
    | "NOT_FOUND"
    | "NOT_A_DIRECTORY"
    | "ACCESS_DENIED"
    | "INVALID_INPUT";

export class TerminalError extends Error {
    readonly code: TerminalErrorCode;
    readonly details?: Record<string, unknown>;

    constructor(code: TerminalErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = "TerminalError";
        this.code = code;
        this.details = details;
    }
}

export function isTerminalError(error: unknown, code?: TerminalErrorCode): error is TerminalError {
    return error instanceof TerminalError && (code === undefined || error.code === code);
}

export interface PublicError {
    message: string;
    code: string;
}

const MAX_PUBLIC_MESSAGE = 300;

export function buildPublicError(error: unknown, fallbackMessage: string, fallbackCode: string): PublicError {
    if (error instanceof Error) {
        const message = error.message || fallbackMessage;
        const code = isTerminalError(error) ? error.code : fallbackCode;
        const safeMessage = message.length > MAX_PUBLIC_MESSAGE ? message.slice(0, MAX_PUBLIC_MESSAGE) + "…" : message;
        return { message: safeMessage, code };
    }
    return { message: fallbackMessage, code: fallbackCode };
}

export function errnoCode(error: unknown): string | undefined {
    if (error instanceof Error && "code" in error && typeof error.code === "string") return error.code;
    return undefined;
}

/** Maps filesystem errno codes onto the terminal error taxonomy. */
export function fromFsError(error: unknown, target: string): TerminalError {
    const errno = errnoCode(error);
    switch (errno) {
        case "ENOENT":
            return new TerminalError("NOT_FOUND", `no such file or directory: ${target}`);
        case "ENOTDIR":
            return new TerminalError("NOT_A_DIRECTORY", `not a directory: ${target}`);
        case "EACCES":
        case "EPERM":
            return new TerminalError("ACCESS_DENIED", `permission denied: ${target}`);
        case "EISDIR":
            return new TerminalError("INVALID_INPUT", `is a directory: ${target}`);
        default:
            return new TerminalError("ACCESS_DENIED", error instanceof Error ? error.message : String(error));
    }
}
