import readline from "readline";

/**
 * Ask one question and resolve with the raw answer
 */
export type Ask = (query: string) => Promise<string>;

/**
 * Thrown by a prompt once its input has been closed (end of input or Ctrl+C)
 */
export class InputClosedError extends Error {
  constructor() {
    super("Input closed");
    this.name = "InputClosedError";
  }
}

/**
 * Wrap a readline interface as an Ask function.
 * Pending and future questions reject with InputClosedError after close.
 */
export function createPrompt(rl: readline.Interface): Ask {
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return (query: string) =>
    new Promise((resolve, reject) => {
      if (closed) {
        reject(new InputClosedError());
        return;
      }

      const onClose = () => reject(new InputClosedError());
      rl.once("close", onClose);
      rl.question(query, (answer: string) => {
        rl.off("close", onClose);
        resolve(answer);
      });
    });
}

/**
 * Ask the user to choose from a menu of options (1-based)
 */
export async function askMenu(ask: Ask, title: string, options: string[]): Promise<number> {
  console.log(`\n--- ${title} ---`);
  options.forEach((opt, i) => {
    console.log(`${i + 1}) ${opt}`);
  });
  console.log("");

  while (true) {
    const answer = await ask("Choose an option: ");
    const choice = parseWholeNumber(answer);
    if (choice !== null && choice >= 1 && choice <= options.length) {
      return choice;
    }
    console.log(`❌ Invalid choice. Enter 1-${options.length}.`);
  }
}

/**
 * Parse a whole number typed by the user (menu choice or student id), or null if it isn't one
 */
export function parseWholeNumber(input: string): number | null {
  const trimmed = input.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  return parseInt(trimmed, 10);
}

/**
 * Parse a score typed by the user, or null for blank / non-numeric input.
 * Range checking is left to the student record.
 */
export function parseScore(input: string): number | null {
  const trimmed = input.trim();
  if (!trimmed) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isNaN(value) ? null : value;
}

/**
 * Answers that end the subject entry loop
 */
export function isDoneAnswer(input: string): boolean {
  const lower = input.trim().toLowerCase();
  return lower === "" || lower === "done" || lower === "d";
}
