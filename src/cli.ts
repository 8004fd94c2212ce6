import { join } from "node:path";
import { INPUT_EXTENSION } from "./constants";
import { loadConfig } from "./env";
import { findPostUrls, summarize } from "./findUrls";
import { createSearch, type SearchTransport } from "./googleSearch";
import { consoleLogger, type Logger } from "./helpers/log.helper";
import { parseNetworkChoice, type NetworkProfile } from "./networks";
import { askFileName, askNetwork, createPrompt, listFiles, type Prompt } from "./prompt";
import { readPosts, validateFileExtension } from "./load";
import { outputFileName, savePosts, withColumn } from "./save";
import type { RunCounters } from "./types";

export type CliArgs = {
  network?: string;
  file?: string;
};

function flagValue(argv: readonly string[], flag: string): string | undefined {
  const idx = argv.findIndex((a) => a === flag);
  if (idx >= 0 && argv[idx + 1]) return argv[idx + 1];
  const inline = argv.find((a) => a.startsWith(`${flag}=`));
  return inline?.slice(flag.length + 1);
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  return {
    network: flagValue(argv, "--network"),
    file: flagValue(argv, "--file"),
  };
}

// the terminal is only taken over when a question actually has to be asked
function lazyPrompt(open: () => Prompt): Prompt {
  let prompt: Prompt | undefined;
  return {
    ask: (question) => (prompt ??= open()).ask(question),
    close: () => prompt?.close(),
  };
}

export type RunDeps = {
  env: NodeJS.ProcessEnv;
  cwd: string;
  createPrompt: () => Prompt;
  transport?: SearchTransport;
  sleep?: (ms: number) => Promise<void>;
  logger: Logger;
};

export type RunResult = {
  outputPath: string;
  counters: RunCounters;
};

export async function run(argv: readonly string[], deps: Partial<RunDeps> = {}): Promise<RunResult> {
  const {
    env = process.env,
    cwd = ".",
    createPrompt: openPrompt = createPrompt,
    transport,
    sleep,
    logger = consoleLogger,
  } = deps;

  const config = loadConfig(env);
  const args = parseCliArgs(argv);

  const prompt = lazyPrompt(openPrompt);
  const ask = prompt.ask;

  let network: NetworkProfile;
  let fileName: string;
  try {
    network = args.network ? parseNetworkChoice(args.network) : await askNetwork(ask);
    if (args.file) {
      fileName = args.file;
    } else {
      logger.info("Select the extraction file (CSV) with the posts:");
      fileName = await askFileName(ask, await listFiles(cwd), logger);
    }
  } finally {
    prompt.close();
  }

  validateFileExtension(fileName, INPUT_EXTENSION);
  const inputPath = args.file ? fileName : join(cwd, fileName);
  const table = await readPosts(inputPath, network);

  logger.info("Starting URL search...\n");
  const search = createSearch(network, {
    credentials: config.credentials,
    maxResults: config.maxResults,
    maxRetries: config.maxRetries,
    transport,
    sleep,
    logger,
  });
  const result = await findPostUrls(table.rows, network, search, logger);

  const outputPath = outputFileName(inputPath);
  await savePosts({ fields: withColumn(table.fields, network.urlColumn), rows: result.rows }, outputPath);

  summarize(result.counters, logger);
  logger.success(`Saved to: ${outputPath}`);

  return { outputPath, counters: result.counters };
}
