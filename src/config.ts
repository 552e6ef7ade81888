import { z } from "zod";
import { ConfigurationError, UserInputError } from "./errors.js";

export interface RepoConfig {
  owner: string;
  name: string;
}

export const IMAGE_SIZES = [
  "256x256",
  "512x512",
  "1024x1024",
  "1792x1024",
  "1024x1792",
] as const;

export type ImageSize = (typeof IMAGE_SIZES)[number];

export interface Config {
  openaiApiKey: string;
  openaiModel: string;
  openaiImageModel: string;
  imageSize: ImageSize;

  githubToken?: string;
  githubApiUrl: string;

  timezone: string;
  imageDownloadTimeoutMs: number;
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: optionalText,
  OPENAI_MODEL: optionalText,
  OPENAI_IMAGE_MODEL: optionalText,
  OPENAI_IMAGE_SIZE: optionalText.pipe(z.enum(IMAGE_SIZES).optional()),
  GITHUB_TOKEN: optionalText,
  GITHUB_API_URL: optionalText.pipe(z.string().url().optional()),
  TIMEZONE: optionalText.refine(
    (zone) => zone === undefined || isValidTimeZone(zone),
    { message: "Unknown time zone" },
  ),
  IMAGE_DOWNLOAD_TIMEOUT_MS: optionalText.pipe(
    z.coerce.number().int().positive().optional(),
  ),
});

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

export function parseRepo(repo: string): RepoConfig {
  const parts = repo.trim().split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new UserInputError(
      `Invalid repo format: ${repo}. Expected format: owner/name`,
    );
  }
  return { owner: parts[0], name: parts[1] };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError("Invalid configuration", issues);
  }
  const vars = parsed.data;

  if (!vars.OPENAI_API_KEY) {
    throw new ConfigurationError(
      "OPENAI_API_KEY is required. Set it in the environment or in a .env file.",
    );
  }

  return {
    openaiApiKey: vars.OPENAI_API_KEY,
    openaiModel: vars.OPENAI_MODEL ?? "gpt-4",
    openaiImageModel: vars.OPENAI_IMAGE_MODEL ?? "dall-e-3",
    imageSize: vars.OPENAI_IMAGE_SIZE ?? "1024x1024",
    githubToken: vars.GITHUB_TOKEN,
    githubApiUrl: (vars.GITHUB_API_URL ?? "https://api.github.com").replace(/\/+$/, ""),
    timezone: vars.TIMEZONE ?? "UTC",
    imageDownloadTimeoutMs: vars.IMAGE_DOWNLOAD_TIMEOUT_MS ?? 30_000,
  };
}
