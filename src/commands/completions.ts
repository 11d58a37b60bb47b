/**
 * `dbtkit completions` — generate shell completions for zsh, bash, or fish,
 * and `--install-completion` to hook them into the shell's startup file.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { UsageError } from "../lib/args.js";
import { isMissingFile } from "../lib/documents.js";
import { isJsonMode, output } from "../lib/output.js";

export const SHELLS = ["bash", "zsh", "fish"] as const;
export type Shell = (typeof SHELLS)[number];

export function isShell(value: string): value is Shell {
  return SHELLS.some((s) => s === value);
}

export const TOP_LEVEL = ["dbt", "completions", "version", "help"];

/** Words offered after each word; nested levels share the table. */
export const COMMAND_TREE: Record<string, string[]> = {
  dbt: ["profile", "project", "build", "run", "test", "seed", "snapshot", "compile", "deps", "debug", "docs", "clean", "ls"],
  profile: ["init", "show", "edit"],
  project: ["init", "show", "edit"],
  completions: [...SHELLS],
};

export function generateBashCompletions(): string {
  const lines: string[] = [
    `# bash completion for dbtkit`,
    `# Add to ~/.bashrc: eval "$(dbtkit completions bash)"`,
    `_dbtkit() {`,
    `  local cur="\${COMP_WORDS[COMP_CWORD]}"`,
    `  local prev="\${COMP_WORDS[COMP_CWORD-1]}"`,
    ``,
    `  if [[ \${COMP_CWORD} -eq 1 ]]; then`,
    `    COMPREPLY=( $(compgen -W "${TOP_LEVEL.join(" ")}" -- "$cur") )`,
    `    return 0`,
    `  fi`,
    ``,
    `  case "$prev" in`,
  ];

  for (const [word, subs] of Object.entries(COMMAND_TREE)) {
    lines.push(`    ${word}) COMPREPLY=( $(compgen -W "${subs.join(" ")}" -- "$cur") ) ;;`);
  }

  lines.push(
    `  esac`,
    `  return 0`,
    `}`,
    `complete -F _dbtkit dbtkit`
  );

  return lines.join("\n");
}

export function generateZshCompletions(): string {
  const cmds = TOP_LEVEL
    .map((c) => `'${c}:${c} command'`)
    .join("\n        ");

  const subcases: string[] = [];
  for (const [word, subs] of Object.entries(COMMAND_TREE)) {
    subcases.push(`      ${word})\n        compadd ${subs.join(" ")}\n        ;;`);
  }

  return `#compdef dbtkit
# zsh completion for dbtkit
# Add to ~/.zshrc: eval "$(dbtkit completions zsh)"

_dbtkit() {
  local -a commands
  commands=(
        ${cmds}
  )

  _arguments '1:command:->cmd' '*::arg:->args'

  case $state in
    cmd)
      _describe 'command' commands
      ;;
    args)
      case $words[CURRENT-1] in
${subcases.join("\n")}
      esac
      ;;
  esac
}

compdef _dbtkit dbtkit`;
}

export function generateFishCompletions(): string {
  const lines: string[] = [
    `# fish completion for dbtkit`,
    `# Save to ~/.config/fish/completions/dbtkit.fish`,
    ``,
  ];

  for (const cmd of TOP_LEVEL) {
    lines.push(
      `complete -c dbtkit -n '__fish_use_subcommand' -a '${cmd}' -d '${cmd} command'`
    );
  }

  lines.push(``);

  for (const [word, subs] of Object.entries(COMMAND_TREE)) {
    for (const sub of subs) {
      lines.push(
        `complete -c dbtkit -n '__fish_seen_subcommand_from ${word}' -a '${sub}' -d '${sub}'`
      );
    }
  }

  return lines.join("\n");
}

export function completionScript(shell: Shell): string {
  switch (shell) {
    case "bash":
      return generateBashCompletions();
    case "zsh":
      return generateZshCompletions();
    case "fish":
      return generateFishCompletions();
  }
}

export function parseShell(value: string | undefined): Shell {
  if (value === undefined) throw new UsageError(`A shell is required: ${SHELLS.join(", ")}`);
  if (!isShell(value)) throw new UsageError(`Unknown shell: ${value}\nSupported: ${SHELLS.join(", ")}`);
  return value;
}

// ── install ──────────────────────────────────────────────────────────

/** File the completion hook goes into, and what is written there. */
export function installTarget(shell: Shell, home: string = os.homedir()): { file: string; content: string; append: boolean } {
  switch (shell) {
    case "bash":
      return { file: path.join(home, ".bashrc"), content: `eval "$(dbtkit completions bash)"\n`, append: true };
    case "zsh":
      return { file: path.join(home, ".zshrc"), content: `eval "$(dbtkit completions zsh)"\n`, append: true };
    case "fish":
      return {
        file: path.join(home, ".config", "fish", "completions", "dbtkit.fish"),
        content: generateFishCompletions() + "\n",
        append: false,
      };
  }
}

/** Idempotent: a startup file that already has the hook is left alone. */
export async function installCompletion(shell: Shell, home?: string): Promise<{ file: string; changed: boolean }> {
  const target = installTarget(shell, home);
  await fs.mkdir(path.dirname(target.file), { recursive: true });
  if (!target.append) {
    await fs.writeFile(target.file, target.content, "utf-8");
    return { file: target.file, changed: true };
  }
  let existing = "";
  try {
    existing = await fs.readFile(target.file, "utf-8");
  } catch (err) {
    if (!isMissingFile(err)) throw err;
  }
  if (existing.includes(target.content.trim())) return { file: target.file, changed: false };
  const prefix = existing && !existing.endsWith("\n") ? "\n" : "";
  await fs.appendFile(target.file, `${prefix}# dbtkit completion\n${target.content}`, "utf-8");
  return { file: target.file, changed: true };
}

export async function completionsCommand(
  sub: string | undefined,
  _rest: string[]
): Promise<void> {
  switch (sub) {
    case "help":
    case "--help":
    case "-h":
    case undefined:
      if (isJsonMode()) {
        output({ shells: SHELLS, commands: TOP_LEVEL, subcommands: COMMAND_TREE });
      } else {
        console.log("Usage: dbtkit completions <shell>\n");
        console.log(`Shells: ${SHELLS.join(", ")}\n`);
        console.log("Examples:");
        console.log('  eval "$(dbtkit completions bash)"    # add to ~/.bashrc');
        console.log('  eval "$(dbtkit completions zsh)"     # add to ~/.zshrc');
        console.log("  dbtkit completions fish > ~/.config/fish/completions/dbtkit.fish");
        console.log("  dbtkit --install-completion bash     # do the above for you");
      }
      return;
    default:
      console.log(completionScript(parseShell(sub)));
  }
}
