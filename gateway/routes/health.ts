import type { RouteHandler } from "../lib/router.js";
import { json } from "../lib/router.js";
import type { CommandExecutor } from "../core/terminal/executor.js";

export function healthzRoute(executor: CommandExecutor): RouteHandler {
    return async (_req, res) => {
        json(res, 200, {
            ok: true,
            status: "ok",
            cwd: executor.getCurrentDirectory(),
            history_size: executor.historySize,
        });
    };
}
