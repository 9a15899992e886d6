import test from "node:test";
import assert from "node:assert/strict";
import {
  validateChangeDirectoryInput,
  validateExecuteCommandInput,
  validateHistoryQuery,
  validateWriteFileInput,
} from "../../schemas/terminal.js";

test("execute schema requires a command and a positive timeout", () => {
  assert.deepEqual(validateExecuteCommandInput({ command: " ls ", timeout: 5 }), {
    ok: true,
    value: { command: "ls", timeout: 5 },
  });
  assert.deepEqual(validateExecuteCommandInput({}), { ok: false, error: "command: Required" });
  assert.deepEqual(validateExecuteCommandInput({ command: "   " }), { ok: false, error: "command: command is required" });
  assert.equal(validateExecuteCommandInput({ command: "ls", timeout: -1 }).ok, false);
  assert.equal(validateExecuteCommandInput({ command: "ls", timeout: 2_147_483 }).ok, true);
  assert.equal(validateExecuteCommandInput({ command: "ls", timeout: 3_000_000 }).ok, false);
  assert.equal(validateExecuteCommandInput({ command: "ls", shell: "zsh" }).ok, false);
  assert.equal(validateExecuteCommandInput("ls").ok, false);
});

test("change directory schema requires a path", () => {
  assert.deepEqual(validateChangeDirectoryInput({ path: "/tmp" }), { ok: true, value: { path: "/tmp" } });
  assert.deepEqual(validateChangeDirectoryInput({ path: "" }), { ok: false, error: "path: path is required" });
});

test("write file schema accepts only known modes", () => {
  assert.equal(validateWriteFileInput({ path: "a.txt", content: "x", mode: "append" }).ok, true);
  assert.equal(validateWriteFileInput({ path: "a.txt", content: "x", mode: "truncate" }).ok, false);
  assert.equal(validateWriteFileInput({ path: "a.txt" }).ok, false);
});

test("history query coerces the count", () => {
  assert.deepEqual(validateHistoryQuery({ count: "5" }), { ok: true, value: { count: 5 } });
  const none = validateHistoryQuery({ count: undefined });
  assert.ok(none.ok);
  assert.equal(none.value.count, undefined);
  assert.equal(validateHistoryQuery({ count: "many" }).ok, false);
});
