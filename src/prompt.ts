import { readdir } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { consoleLogger, type Logger } from "./helpers/log.helper";
import { networkMenu, parseNetworkChoice, type NetworkProfile } from "./networks";

export type Ask = (question: string) => Promise<string>;

export type Prompt = {
  ask: Ask;
  close(): void;
};

export function createPrompt(): Prompt {
  const rl = createInterface({ input, output });
  return {
    ask: (question) => rl.question(question),
    close: () => rl.close(),
  };
}

/** Regular, non-hidden files of a directory, sorted by name. */
export async function listFiles(dir = "."): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && !e.name.startsWith("."))
    .map((e) => e.name)
    .sort();
}

export async function askNetwork(ask: Ask): Promise<NetworkProfile> {
  const answer = await ask(`Choose the social network:\n${networkMenu()}\n`);
  return parseNetworkChoice(answer);
}

/**
 * Keeps asking until the answer names one of `files`, either by name or by
 * its 1-based position. `?` prints the numbered list.
 */
export async function askFileName(
  ask: Ask,
  files: readonly string[],
  logger: Logger = consoleLogger
): Promise<string> {
  for (;;) {
    const answer = (await ask("Please enter the file name (or '?' to list): ")).trim();

    if (answer === "?") {
      files.forEach((file, i) => logger.info(`${i + 1}. ${file}`));
      continue;
    }

    if (/^\d+$/.test(answer)) {
      const file = files[Number(answer) - 1];
      if (file !== undefined) return file;
    } else if (files.includes(answer)) {
      return answer;
    }

    logger.warn("Invalid file name. Please try again.");
  }
}
