import { z } from "zod";
import { MAX_TIMEOUT_SECONDS } from "../core/terminal/process.js";

export interface ValidationResult<T> {
    ok: true;
    value: T;
}
export interface ValidationErrorResult {
    ok: false;
    error: string;
}
export type Validator<T> = (input: unknown) => ValidationResult<T> | ValidationErrorResult;

function fromSchema<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Validator<T> {
    return (input) => {
        const parsed = schema.safeParse(input);
        if (parsed.success) return { ok: true, value: parsed.data };
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
        return { ok: false, error: `${where}${issue?.message ?? "invalid input"}` };
    };
}

export const executeCommandSchema = z
    .object({
        command: z.string().trim().min(1, "command is required"),
        timeout: z.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
        working_directory: z.string().min(1).optional(),
    })
    .strict();
export type ExecuteCommandInput = z.infer<typeof executeCommandSchema>;

export const changeDirectorySchema = z.object({ path: z.string().min(1, "path is required") }).strict();
export type ChangeDirectoryInput = z.infer<typeof changeDirectorySchema>;

export const writeFileSchema = z
    .object({
        path: z.string().min(1, "path is required"),
        content: z.string(),
        mode: z.enum(["overwrite", "append"]).optional(),
    })
    .strict();
export type WriteFileInput = z.infer<typeof writeFileSchema>;

export const historyQuerySchema = z.object({
    count: z.coerce.number().int().optional(),
});

export const validateExecuteCommandInput: Validator<ExecuteCommandInput> = fromSchema(executeCommandSchema);
export const validateChangeDirectoryInput: Validator<ChangeDirectoryInput> = fromSchema(changeDirectorySchema);
export const validateWriteFileInput: Validator<WriteFileInput> = fromSchema(writeFileSchema);
export const validateHistoryQuery: Validator<z.infer<typeof historyQuerySchema>> = fromSchema(historyQuerySchema);
