/**
 * Interactive prompting for the record command.
 */

import * as readline from "node:readline";

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Create a prompter over a readline interface. One interface serves every
 * question so piped input is not lost between prompts.
 */
export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });

  return {
    ask(question) {
      if (closed) {
        return Promise.reject(new Error("Input closed before all answers were given"));
      }
      return new Promise((resolve, reject) => {
        const onClose = () => reject(new Error("Input closed before all answers were given"));
        rl.once("close", onClose);
        rl.question(question, (answer) => {
          rl.off("close", onClose);
          resolve(answer);
        });
      });
    },
    close() {
      rl.close();
    },
  };
}

/**
 * Render the status menu, one numbered entry per line.
 */
export function formatStatusMenu(statuses: readonly string[]): string {
  return statuses.map((status, i) => `  ${i + 1}) ${status}`).join("\n");
}

/**
 * Interpret an answer to the status prompt: a menu number, a menu entry in
 * any case, or free text. A blank answer yields the fallback.
 */
export function resolveStatusChoice(
  answer: string,
  statuses: readonly string[],
  fallback = "",
): string {
  const trimmed = answer.trim();
  if (trimmed === "") return fallback;

  if (/^\d+$/.test(trimmed)) {
    const choice = statuses[parseInt(trimmed, 10) - 1];
    if (choice !== undefined) return choice;
  }

  const known = statuses.find((s) => s.toLowerCase() === trimmed.toLowerCase());
  return known ?? trimmed;
}

/**
 * Format a question with its default shown in brackets.
 */
export function withDefault(question: string, fallback: string | null | undefined): string {
  return fallback ? `${question} [${fallback}]: ` : `${question}: `;
}
