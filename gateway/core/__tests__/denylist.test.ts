import test from "node:test";
import assert from "node:assert/strict";
import { CommandDenylist } from "../policy/denylist.js";

const denylist = new CommandDenylist();

test("destructive commands are matched with the rule that caught them", () => {
  const cases: Array<[string, string]> = [
    ["rm -rf /", "rm-root"],
    ["sudo rm -rf / --no-preserve-root", "rm-root"],
    ["rm -rf /*", "rm-root"],
    ["rm -rf ~", "rm-home"],
    ["mkfs.ext4 /dev/sda1", "mkfs"],
    ["dd if=/dev/zero of=/dev/sda bs=1M", "dd-device"],
    ["echo x > /dev/sda", "redirect-device"],
    [":(){ :|:& };:", "fork-bomb"],
    ["chmod -R 777 /", "chmod-root"],
    ["shutdown -h now", "power"],
    ["sudo reboot", "power"],
    ["make && /sbin/poweroff", "power"],
    ["ls; mkfs -t ext4 /dev/sdb1", "mkfs"],
    ["format C:", "format-drive"],
  ];
  for (const [command, ruleId] of cases) {
    assert.equal(denylist.inspectCommand(command)?.rule_id, ruleId, command);
  }
});

test("ordinary commands pass", () => {
  const allowed = [
    "rm -rf /tmp/build",
    "rm -rf ./dist",
    "rm -rf ~/scratch",
    "ls -la /",
    "echo hello",
    "dd if=in.img of=out.img",
    "chmod -R 755 ./src",
    "cat ~/notes.txt",
    "cat /var/log/shutdown.log",
    "grep reboot syslog",
    "man mkfs",
    "./halt-check.sh",
  ];
  for (const command of allowed) {
    assert.equal(denylist.inspectCommand(command), undefined, command);
  }
});

test("matching is case-sensitive", () => {
  assert.equal(denylist.inspectCommand("RM -RF /"), undefined);
  assert.equal(denylist.inspectCommand("MKFS /dev/sda"), undefined);
});

test("configured substrings extend the built-in rules", () => {
  const custom = new CommandDenylist(["git push --force", ""]);
  const match = custom.inspectCommand("git push --force origin main");
  assert.deepEqual(match, {
    rule_id: "custom-1",
    description: 'configured pattern "git push --force"',
    evidence: "git push --force",
  });
  assert.equal(custom.inspectCommand("GIT PUSH --FORCE origin main"), undefined);
  assert.equal(custom.listRules().length, new CommandDenylist().listRules().length + 1);
});
