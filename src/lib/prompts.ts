/**
 * Line-based prompts for the interactive wizards.
 *
 * The wizards only see the `Prompter` interface, so tests drive them with a
 * scripted answer list instead of a terminal.
 */

import * as readline from "readline/promises";
import { Writable } from "stream";

export interface Choice<T extends string = string> {
  value: T;
  label: string;
}

export interface Prompter {
  text(message: string, options?: { default?: string; validate?: (value: string) => string | undefined }): Promise<string>;
  password(message: string): Promise<string>;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  select<T extends string>(message: string, choices: readonly Choice<T>[], defaultValue?: T): Promise<T>;
  close(): void;
}

/** Raised when the user ends input (Ctrl-D) mid-wizard. */
export class PromptAborted extends Error {
  constructor() {
    super("Aborted");
    this.name = "PromptAborted";
    Object.setPrototypeOf(this, PromptAborted.prototype);
  }
}

/** stdout passthrough that can be muted while a secret is typed. */
class MutableStdout extends Writable {
  muted = false;

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) process.stdout.write(chunk);
    callback();
  }
}

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

export class TerminalPrompter implements Prompter {
  private out = new MutableStdout();
  private rl: readline.Interface;
  private closed = false;

  constructor() {
    this.rl = readline.createInterface({ input: process.stdin, output: this.out, terminal: true });
    this.rl.on("close", () => {
      this.closed = true;
    });
  }

  private async ask(question: string): Promise<string> {
    if (this.closed) throw new PromptAborted();
    const answer = await this.rl.question(question);
    return answer.trim();
  }

  async text(message: string, options: { default?: string; validate?: (value: string) => string | undefined } = {}): Promise<string> {
    const hint = options.default ? ` (${options.default})` : "";
    for (;;) {
      const answer = (await this.ask(`? ${message}${hint}: `)) || options.default || "";
      const problem = options.validate?.(answer);
      if (!problem) return answer;
      console.log(`  ✗ ${problem}`);
    }
  }

  async password(message: string): Promise<string> {
    process.stdout.write(`? ${message}: `);
    this.out.muted = true;
    try {
      return await this.ask("");
    } finally {
      this.out.muted = false;
      process.stdout.write("\n");
    }
  }

  async confirm(message: string, defaultValue = false): Promise<boolean> {
    const hint = defaultValue ? "Y/n" : "y/N";
    for (;;) {
      const answer = (await this.ask(`? ${message} (${hint}) `)).toLowerCase();
      if (!answer) return defaultValue;
      if (["y", "yes"].includes(answer)) return true;
      if (["n", "no"].includes(answer)) return false;
    }
  }

  async select<T extends string>(message: string, choices: readonly Choice<T>[], defaultValue?: T): Promise<T> {
    console.log(`? ${message}`);
    choices.forEach((c, i) => console.log(`  ${i + 1}) ${c.label}${c.value === defaultValue ? " (default)" : ""}`));
    for (;;) {
      const answer = await this.ask("  Choice: ");
      if (!answer && defaultValue !== undefined) return defaultValue;
      const byIndex = choices[Number(answer) - 1];
      if (/^\d+$/.test(answer) && byIndex) return byIndex.value;
      const byValue = choices.find((c) => c.value === answer);
      if (byValue) return byValue.value;
      console.log(`  ✗ enter a number between 1 and ${choices.length}`);
    }
  }

  close(): void {
    this.rl.close();
  }
}
