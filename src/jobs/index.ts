#!/usr/bin/env node
import chalk from "chalk";
import { config as loadEnv } from "dotenv";
import { loadConfig } from "../config.js";
import { StorytellerError } from "../errors.js";
import {
  OpenAIImageGenerator,
  OpenAITextGenerator,
  createOpenAIClient,
} from "../llm/openai.js";
import { downloadImage } from "../media/downloadImage.js";
import { StubWebSearch } from "../search/webSearch.js";
import { USAGE, parseCliArgs } from "./cliArgs.js";
import { runArticleJob, runRevisionJob } from "./runArticleJob.js";

async function main(argv: string[]): Promise<void> {
  const options = parseCliArgs(argv);
  if (options.help) {
    console.log(USAGE);
    return;
  }

  loadEnv();
  const config = loadConfig();
  const client = createOpenAIClient(config);
  const textGenerator = new OpenAITextGenerator(client, config.openaiModel);

  if (options.update) {
    await runRevisionJob(options.update, options.direction ?? "", textGenerator);
    return;
  }

  if (!options.repo || options.prNumber === undefined) {
    console.log(USAGE);
    process.exitCode = 1;
    return;
  }

  await runArticleJob(
    {
      repo: options.repo,
      prNumber: options.prNumber,
      direction: options.direction,
      output: options.output,
      enhance: options.enhance,
      illustrate: options.illustrate,
    },
    config,
    {
      textGenerator,
      imageGenerator: new OpenAIImageGenerator(client, config.openaiImageModel, config.imageSize),
      webSearch: new StubWebSearch(),
      downloadImage: (url, destination) =>
        downloadImage(url, destination, { timeoutMs: config.imageDownloadTimeoutMs }),
    },
  );
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof StorytellerError) {
    console.error(`${chalk.red.bold("Error:")} ${err.message}`);
    if (err.internalDetails) {
      console.error(chalk.dim(`Details: ${err.internalDetails}`));
    }
  } else {
    console.error("Blog post generation failed:", err);
  }
  process.exit(1);
});
