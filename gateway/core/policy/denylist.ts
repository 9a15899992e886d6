/**
 * Destructive-command denylist. Matching is case-sensitive and runs on the
 * raw command text before anything is spawned.
 *
 * This is a deterrent, not a sandbox: a shell command can always be
 * rewritten (variables, eval, base64, scripts on disk) so that no string
 * rule sees it.
 */
export interface DenyRule {
  id: string;
  description: string;
  pattern: RegExp | string;
}

export interface DenyMatch {
  rule_id: string;
  description: string;
  evidence: string;
}

const END = "(?=$|[\\s;&|)])";
// Command position, optionally behind sudo or a directory path.
const COMMAND_START = "(?:^\\s*|[;&|(`]\\s*|\\bsudo\\s+(?:-\\S+\\s+)*)(?:\\S*\\/)?";

export const BUILT_IN_DENY_RULES: readonly DenyRule[] = [
  {
    id: "rm-root",
    description: "recursive deletion of the filesystem root",
    pattern: new RegExp(`\\brm\\s+(?:-\\S*\\s+)+\\/\\*?${END}`),
  },
  {
    id: "rm-home",
    description: "recursive deletion of the home directory",
    pattern: new RegExp(`\\brm\\s+(?:-\\S*\\s+)+(?:~|\\$HOME)\\/?\\*?${END}`),
  },
  { id: "mkfs", description: "filesystem formatting", pattern: new RegExp(`${COMMAND_START}mkfs(?:\\.\\w+)?\\b`) },
  {
    id: "dd-device",
    description: "dd writing onto a block device",
    pattern: /\bdd\b[^;&|]*\bof=\/dev\/(?:sd|hd|vd|xvd|nvme|mmcblk|disk)/,
  },
  {
    id: "redirect-device",
    description: "shell redirection onto a block device",
    pattern: />\s*\/dev\/(?:sd|hd|vd|xvd|nvme|mmcblk|disk)/,
  },
  { id: "fork-bomb", description: "fork bomb", pattern: /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/ },
  {
    id: "chmod-root",
    description: "recursive permission change on the filesystem root",
    pattern: new RegExp(`\\bchmod\\s+-R\\s+777\\s+\\/${END}`),
  },
  {
    id: "power",
    description: "host shutdown or reboot",
    pattern: new RegExp(`${COMMAND_START}(?:shutdown|reboot|poweroff|halt)${END}`),
  },
  { id: "format-drive", description: "drive formatting", pattern: /\bformat\s+[A-Za-z]:/ },
];

function matchRule(rule: DenyRule, command: string): string | undefined {
  if (typeof rule.pattern === "string") {
    return command.includes(rule.pattern) ? rule.pattern : undefined;
  }
  return command.match(rule.pattern)?.[0];
}

export class CommandDenylist {
  private readonly rules: readonly DenyRule[];

  constructor(extraSubstrings: readonly string[] = [], rules: readonly DenyRule[] = BUILT_IN_DENY_RULES) {
    const extras = extraSubstrings
      .filter((s) => s.length > 0)
      .map((s, i): DenyRule => ({ id: `custom-${i + 1}`, description: `configured pattern "${s}"`, pattern: s }));
    this.rules = [...rules, ...extras];
  }

  inspectCommand(command: string): DenyMatch | undefined {
    for (const rule of this.rules) {
      const evidence = matchRule(rule, command);
      if (evidence !== undefined) {
        return { rule_id: rule.id, description: rule.description, evidence };
      }
    }
    return undefined;
  }

  listRules(): readonly DenyRule[] {
    return this.rules;
  }
}
