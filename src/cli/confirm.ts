/**
 * Interactive yes/no gate in front of a destructive cleanup
 *
 * Blocks with no timeout. Closing the input counts as "no".
 */

import { createInterface } from "readline";
import { CLEANUP_CONFIRM_ANSWER } from "@/constants";

export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === CLEANUP_CONFIRM_ANSWER;
}

export function promptConfirmation(
  prompt: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = createInterface({ input, output });
    let answered = false;

    rl.on("close", () => {
      if (!answered) {
        resolve(false);
      }
    });

    rl.question(prompt, (answer) => {
      answered = true;
      rl.close();
      resolve(isAffirmative(answer));
    });
  });
}
