import type { IncomingMessage, ServerResponse } from "node:http";
import type { RouteHandler } from "../lib/router.js";
import { json, parseQuery, PayloadTooLargeError, readBody } from "../lib/router.js";
import { buildPublicError } from "../lib/errors.js";
import type { CommandExecutor } from "../core/terminal/executor.js";
import { formatHistoryLines } from "../core/terminal/format.js";
import type { Validator } from "../schemas/terminal.js";
import {
    validateChangeDirectoryInput,
    validateExecuteCommandInput,
    validateHistoryQuery,
    validateWriteFileInput,
} from "../schemas/terminal.js";

const STATUS_BY_CODE: Record<string, number> = {
    INVALID_INPUT: 400,
    NOT_A_DIRECTORY: 400,
    BLOCKED: 403,
    ACCESS_DENIED: 403,
    NOT_FOUND: 404,
    TIMEOUT: 408,
    SPAWN_FAILURE: 422,
};

export function sendError(res: ServerResponse, error: unknown): void {
    if (error instanceof PayloadTooLargeError) {
        json(res, 413, { ok: false, error: error.message, error_code: "PAYLOAD_TOO_LARGE" });
        return;
    }
    if (error instanceof SyntaxError) {
        json(res, 400, { ok: false, error: "body must be valid JSON", error_code: "INVALID_INPUT" });
        return;
    }
    const publicError = buildPublicError(error, "terminal operation failed", "INTERNAL");
    json(res, STATUS_BY_CODE[publicError.code] ?? 500, { ok: false, error: publicError.message, error_code: publicError.code });
}

async function readValidated<T>(req: IncomingMessage, maxBodyBytes: number, validate: Validator<T>): Promise<ReturnType<Validator<T>>> {
    const raw = await readBody(req, maxBodyBytes);
    const payload: unknown = raw ? JSON.parse(raw) : {};
    return validate(payload);
}

export function executeRoute(executor: CommandExecutor, maxBodyBytes: number): RouteHandler {
    return async (req, res) => {
        try {
            const input = await readValidated(req, maxBodyBytes, validateExecuteCommandInput);
            if (!input.ok) {
                json(res, 400, { ok: false, error: input.error, error_code: "INVALID_INPUT" });
                return;
            }
            const result = await executor.execute(input.value.command, {
                timeoutSeconds: input.value.timeout,
                workingDirectory: input.value.working_directory,
            });
            json(res, 200, { ok: true, data: result });
        } catch (error) {
            sendError(res, error);
        }
    };
}

export function historyRoute(executor: CommandExecutor): RouteHandler {
    return async (req, res) => {
        const query = parseQuery(req);
        const parsed = validateHistoryQuery({ count: query.get("count") ?? undefined });
        if (!parsed.ok) {
            json(res, 400, { ok: false, error: parsed.error, error_code: "INVALID_INPUT" });
            return;
        }
        const entries = executor.getHistory(parsed.value.count);
        json(res, 200, { ok: true, data: { entries, lines: formatHistoryLines(entries) } });
    };
}

export function currentDirectoryRoute(executor: CommandExecutor): RouteHandler {
    return async (_req, res) => {
        json(res, 200, { ok: true, data: { cwd: executor.getCurrentDirectory() } });
    };
}

export function changeDirectoryRoute(executor: CommandExecutor, maxBodyBytes: number): RouteHandler {
    return async (req, res) => {
        try {
            const input = await readValidated(req, maxBodyBytes, validateChangeDirectoryInput);
            if (!input.ok) {
                json(res, 400, { ok: false, error: input.error, error_code: "INVALID_INPUT" });
                return;
            }
            const newDirectory = await executor.changeDirectory(input.value.path);
            json(res, 200, { ok: true, data: { newDirectory } });
        } catch (error) {
            sendError(res, error);
        }
    };
}

export function listDirectoryRoute(executor: CommandExecutor): RouteHandler {
    return async (req, res) => {
        try {
            const target = parseQuery(req).get("path") ?? ".";
            json(res, 200, { ok: true, data: await executor.listDirectory(target) });
        } catch (error) {
            sendError(res, error);
        }
    };
}

export function writeFileRoute(executor: CommandExecutor, maxBodyBytes: number): RouteHandler {
    return async (req, res) => {
        try {
            const input = await readValidated(req, maxBodyBytes, validateWriteFileInput);
            if (!input.ok) {
                json(res, 400, { ok: false, error: input.error, error_code: "INVALID_INPUT" });
                return;
            }
            json(res, 200, { ok: true, data: await executor.writeFile(input.value.path, input.value.content, input.value.mode) });
        } catch (error) {
            sendError(res, error);
        }
    };
}
