import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import type { Config, RepoConfig } from "../config.js";
import {
  defaultOutputPath,
  imagePathFor,
  moveFile,
  readArticle,
  writeArticle,
} from "../article/persist.js";
import {
  type ImageDownloader,
  draftArticle,
  enrichArticle,
  illustrateArticle,
  reviseArticle,
} from "../article/steps.js";
import { collectPrInfo } from "../github/collectPrInfo.js";
import type { ImageGenerator, TextGenerator } from "../llm/types.js";
import { detail, step, success } from "../progress.js";
import type { WebSearchClient } from "../search/webSearch.js";

export interface ArticleServices {
  textGenerator: TextGenerator;
  imageGenerator?: ImageGenerator;
  webSearch: WebSearchClient;
  downloadImage: ImageDownloader;
}

export type JobConfig = Pick<Config, "githubToken" | "githubApiUrl" | "timezone">;

export interface ArticleJobOptions {
  repo: RepoConfig;
  prNumber: number;
  direction?: string;
  output?: string;
  enhance: boolean;
  illustrate: boolean;
  now?: Date;
}

/**
 * Collect -> draft -> illustrate -> enrich -> persist. Returns the written path.
 * The illustration is staged in a temp directory and only moved beside the
 * article once the article itself is written.
 */
export async function runArticleJob(
  options: ArticleJobOptions,
  config: JobConfig,
  services: ArticleServices,
): Promise<string> {
  const startTime = Date.now();
  const outputPath =
    options.output ?? defaultOutputPath(options.prNumber, options.now ?? new Date(), config.timezone);

  const info = await collectPrInfo(options.repo, options.prNumber, {
    apiUrl: config.githubApiUrl,
    token: config.githubToken,
  });
  detail(
    `"${info.title}" by @${info.author}: ${info.diffSummary.fileCount} files, +${info.diffSummary.additions}/-${info.diffSummary.deletions}`,
  );

  let draft = await draftArticle(info, options.direction, services.textGenerator, {
    timezone: config.timezone,
  });

  const imagePath = imagePathFor(outputPath);
  const staging = options.illustrate
    ? await fs.mkdtemp(join(tmpdir(), "pr-storyteller-"))
    : undefined;
  const staged: { image?: string } = {};
  const downloadImage: ImageDownloader = async (url, destination) => {
    const saved = await services.downloadImage(url, destination);
    if (saved) staged.image = destination;
    return saved;
  };

  try {
    draft = await illustrateArticle(
      draft,
      info,
      { ...services, downloadImage },
      staging ? join(staging, basename(imagePath)) : undefined,
    );

    if (options.enhance) {
      draft = await enrichArticle(draft, info, services.webSearch, services.textGenerator);
    }

    step(`Saving to ${outputPath}`, "💾");
    await writeArticle(outputPath, draft);
    if (staged.image) {
      await moveFile(staged.image, imagePath);
      detail(`Saved illustration to ${imagePath}`);
    }
  } finally {
    if (staging) {
      await fs.rm(staging, { recursive: true, force: true });
    }
  }

  const duration = ((Date.now() - startTime) / 1000).toFixed(1);
  success(`Blog post saved to ${outputPath} (${duration}s)`);
  return outputPath;
}

export async function runRevisionJob(
  path: string,
  direction: string,
  textGenerator: TextGenerator,
): Promise<string> {
  step(`Reading ${path}`, "📖");
  const existing = await readArticle(path);

  const revised = await reviseArticle(existing, direction, textGenerator);
  await writeArticle(path, revised);

  success(`Updated blog post saved to ${path}`);
  return path;
}
