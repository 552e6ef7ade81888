import type { PrInfo } from "../github/types.js";
import type { SearchResult } from "../search/webSearch.js";
import { formatDisplayDate } from "./dateUtils.js";
import { hasImageReference } from "./markdownImages.js";

export const KEY_FILE_LIMIT = 5;

export const SYSTEM_PROMPTS = {
  draft: "You are a technical writer creating a blog post about code changes.",
  imageFallback:
    "You are a technical writer adding a relevant illustration to a blog post.",
  enrichment:
    "You are a technical writer enhancing a blog post with additional information.",
  revision: "You are a technical writer updating a blog post with new information.",
} as const;

const DRAFT_INSTRUCTIONS = `The blog post should:
1. Have a catchy title
2. Include an introduction explaining the purpose of the changes
3. Highlight the key technical aspects of the changes
4. Explain the impact or benefits of these changes
5. Include code examples where relevant
6. End with a conclusion

Format the blog post in Markdown.`;

function listOrNone(items: string[]): string {
  return items.length > 0 ? items.join(", ") : "None";
}

export interface DraftPromptOptions {
  timezone: string;
}

export function buildDraftPrompt(
  info: PrInfo,
  direction: string | undefined,
  options: DraftPromptOptions,
): string {
  const { diffSummary } = info;

  let prompt = `Write a technical blog post about the following GitHub pull request:

Title: ${info.title}

Description:
${info.description.trim() || "No description provided."}

Author: ${info.author}
Created: ${formatDisplayDate(info.createdAt, options.timezone)}
URL: ${info.htmlUrl}
Contributors: ${listOrNone(info.contributors)}

Summary of changes:
- Files changed: ${diffSummary.fileCount}
- Additions: ${diffSummary.additions}
- Deletions: ${diffSummary.deletions}
- Languages: ${listOrNone(diffSummary.languages)}

Commit summary:
${info.commitSummary.trimEnd()}

Key files changed:
${listOrNone(diffSummary.filesChanged.slice(0, KEY_FILE_LIMIT))}`;

  if (direction && direction.trim()) {
    prompt += `\n\nAdditional direction for the blog post:\n${direction}`;
  }

  return `${prompt}\n\n${DRAFT_INSTRUCTIONS}`;
}

export function buildIllustrationPrompt(info: PrInfo): string {
  const languages = info.diffSummary.languages;
  const stack =
    languages.length > 0 ? `code written in ${languages.join(", ")}` : "a software code change";

  return `A professional technical illustration for a blog post titled "${info.title}", about ${stack}. Clean, modern editorial style with abstract shapes suggesting software architecture and data flow. No text, letters or logos in the image.`;
}

export function buildImageFallbackPrompt(draft: string, info: PrInfo): string {
  return `Here is a blog post:

${draft}

The post has no illustration yet. Insert exactly one Markdown image reference of the form ![caption](url) directly after the title, using a publicly reachable image URL that fits "${info.title}".
Return the complete blog post, unchanged apart from the image, in Markdown format.`;
}

export function buildEnrichmentPrompt(draft: string, results: SearchResult[]): string {
  let prompt = `Here is a blog post:

${draft}

Here are some related resources from the web:

${JSON.stringify(results, null, 2)}

Enhance the blog post by incorporating relevant information from these resources.
Add a "Related Resources" section at the end with links to the most relevant resources.
Keep the blog post in Markdown format.`;

  if (!hasImageReference(draft)) {
    prompt += `\n\nIMPORTANT: The blog post currently has no images. You MUST include at least one relevant image using Markdown image syntax: ![caption](url).`;
  }

  return prompt;
}

export function buildRevisionPrompt(draft: string, direction: string): string {
  return `Here is an existing blog post:

${draft}

Update this blog post based on the following new information or direction:

${direction}

Keep the blog post in Markdown format.`;
}

export function buildSearchQuery(info: PrInfo): string {
  return [info.title, ...info.diffSummary.languages].join(" ").trim();
}
