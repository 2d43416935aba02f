import { stdin as input, stdout as output } from "node:process";
import readline from "node:readline/promises";

/** Asks a yes/no question; without a terminal the default answer is taken. */
export async function confirm(question: string, defaultYes = true): Promise<boolean> {
  if (!input.isTTY) {
    return defaultYes;
  }
  const rl = readline.createInterface({ input, output });
  try {
    const answer = (await rl.question(`${question} ${defaultYes ? "[Y/n]" : "[y/N]"} `)).trim().toLowerCase();
    if (answer === "") {
      return defaultYes;
    }
    return answer === "y" || answer === "yes";
  } finally {
    rl.close();
  }
}
