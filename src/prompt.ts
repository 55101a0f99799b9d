import readline from "readline";

export type ConfirmFn = (question: string, defaultAnswer: boolean) => Promise<boolean>;

/** Parse a yes/no answer; an empty or unrecognized answer yields `defaultAnswer`. */
export function parseAnswer(answer: string, defaultAnswer: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "y" || normalized === "yes") return true;
  if (normalized === "n" || normalized === "no") return false;
  return defaultAnswer;
}

/**
 * Ask a yes/no question on the terminal.
 *
 * Without a tty on stdin the default answer is returned without asking.
 */
export function createTerminalConfirm(
  input: NodeJS.ReadStream = process.stdin,
  output: NodeJS.WriteStream = process.stderr,
): ConfirmFn {
  return async (question, defaultAnswer) => {
    if (!input.isTTY) return defaultAnswer;

    const choices = defaultAnswer ? "[Y/n]" : "[y/N]";
    const rl = readline.createInterface({ input, output });
    try {
      const answer = await new Promise<string>((resolve) => {
        rl.once("close", () => resolve(""));
        rl.question(`${question} ${choices} `, resolve);
      });
      return parseAnswer(answer, defaultAnswer);
    } finally {
      rl.close();
    }
  };
}
