import { basename } from "node:path";
import { extractError } from "../errors.js";
import type { PrInfo } from "../github/types.js";
import type { ImageGenerator, TextGenerator } from "../llm/types.js";
import { detail, step, warn } from "../progress.js";
import type { WebSearchClient } from "../search/webSearch.js";
import { hasImageReference, imageMarkdown, insertImageAfterHeading } from "./markdownImages.js";
import {
  SYSTEM_PROMPTS,
  buildDraftPrompt,
  buildEnrichmentPrompt,
  buildIllustrationPrompt,
  buildImageFallbackPrompt,
  buildRevisionPrompt,
  buildSearchQuery,
} from "./prompts.js";

export const SEARCH_RESULT_COUNT = 5;

export type ImageDownloader = (url: string, destination: string) => Promise<boolean>;

export async function draftArticle(
  info: PrInfo,
  direction: string | undefined,
  textGenerator: TextGenerator,
  options: { timezone: string },
): Promise<string> {
  step("Writing the first draft", "✍️");
  return textGenerator.generate({
    systemPrompt: SYSTEM_PROMPTS.draft,
    prompt: buildDraftPrompt(info, direction, options),
  });
}

export interface IllustrationServices {
  textGenerator: TextGenerator;
  imageGenerator?: ImageGenerator;
  downloadImage: ImageDownloader;
}

async function tryGenerateIllustration(
  info: PrInfo,
  imageGenerator: ImageGenerator,
  downloadImage: ImageDownloader,
  imagePath: string,
): Promise<string | undefined> {
  step("Generating an illustration", "🎨");
  let url: string;
  try {
    url = await imageGenerator.generateImage({ prompt: buildIllustrationPrompt(info) });
  } catch (err) {
    warn(`Image generation failed: ${extractError(err)}`);
    return undefined;
  }

  if (!(await downloadImage(url, imagePath))) {
    return undefined;
  }
  return imageMarkdown(info.title, basename(imagePath));
}

/**
 * Downloads a generated illustration to `imagePath` and references it by file
 * name, so it must end up beside the article. `imagePath` undefined skips
 * generation; either way a draft left without any image gets one more
 * chat call asking the model to place one itself.
 */
export async function illustrateArticle(
  draft: string,
  info: PrInfo,
  services: IllustrationServices,
  imagePath: string | undefined,
): Promise<string> {
  if (imagePath && services.imageGenerator) {
    const image = await tryGenerateIllustration(
      info,
      services.imageGenerator,
      services.downloadImage,
      imagePath,
    );
    if (image) {
      return insertImageAfterHeading(draft, image);
    }
  }

  if (hasImageReference(draft)) {
    return draft;
  }

  step("Asking the writer to place an image", "🖼️");
  return services.textGenerator.generate({
    systemPrompt: SYSTEM_PROMPTS.imageFallback,
    prompt: buildImageFallbackPrompt(draft, info),
  });
}

export async function enrichArticle(
  draft: string,
  info: PrInfo,
  webSearch: WebSearchClient,
  textGenerator: TextGenerator,
): Promise<string> {
  const query = buildSearchQuery(info);
  step(`Searching the web for "${query}"`, "🌐");
  const results = await webSearch.search(query, SEARCH_RESULT_COUNT);

  if (results.length === 0) {
    detail("No related resources found; keeping the draft as is");
    return draft;
  }

  step(`Enriching the draft with ${results.length} related resources`, "📚");
  return textGenerator.generate({
    systemPrompt: SYSTEM_PROMPTS.enrichment,
    prompt: buildEnrichmentPrompt(draft, results),
  });
}

export async function reviseArticle(
  draft: string,
  direction: string,
  textGenerator: TextGenerator,
): Promise<string> {
  step("Revising the article", "🛠️");
  return textGenerator.generate({
    systemPrompt: SYSTEM_PROMPTS.revision,
    prompt: buildRevisionPrompt(draft, direction),
  });
}
