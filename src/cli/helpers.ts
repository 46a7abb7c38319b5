import readline from "readline";
import { log } from "./logger";

/**
 * What the shell needs from the terminal.
 * `ask` resolves to null once input has ended.
 */
export interface ShellIO {
  ask(question: string): Promise<string | null>;
  log(message: string): void;
}

/**
 * Console IO over a readline interface.
 *
 * Lines are queued as they arrive rather than read through rl.question,
 * so input piped in ahead of the prompts is not dropped.
 */
export function createConsoleIO(rl: readline.Interface): ShellIO {
  const buffered: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on("line", (line: string) => {
    const next = waiting.shift();
    if (next) {
      next(line);
    } else {
      buffered.push(line);
    }
  });

  rl.on("close", () => {
    closed = true;
    for (const resolve of waiting.splice(0)) {
      resolve(null);
    }
  });

  return {
    ask(question: string): Promise<string | null> {
      if (!closed) {
        rl.setPrompt(question);
        rl.prompt();
      }

      const line = buffered.shift();
      if (line !== undefined) {
        return Promise.resolve(line);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => waiting.push(resolve));
    },
    log,
  };
}

/**
 * Parse an id typed by the operator. Returns null for anything but a whole number.
 */
export function parseId(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  const id = parseInt(trimmed, 10);
  return Number.isSafeInteger(id) ? id : null;
}
