import OpenAI from "openai";
import type { Config, ImageSize } from "../config.js";
import { RemoteError, extractError } from "../errors.js";
import type { ImageGenerator, ImageRequest, TextGenerator, TextRequest } from "./types.js";

export const DEFAULT_MAX_TOKENS = 2000;
export const DEFAULT_TEMPERATURE = 0.7;

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err) {
    return typeof err.status === "number" ? err.status : undefined;
  }
  return undefined;
}

function toRemoteError(what: string, err: unknown): RemoteError {
  if (err instanceof RemoteError) return err;
  return new RemoteError(`OpenAI ${what} failed`, statusOf(err), extractError(err));
}

/** Failed calls surface immediately; the SDK's own retries are switched off. */
export function createOpenAIClient(config: Pick<Config, "openaiApiKey">): OpenAI {
  return new OpenAI({ apiKey: config.openaiApiKey, maxRetries: 0 });
}

export class OpenAITextGenerator implements TextGenerator {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {}

  async generate(request: TextRequest): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: request.temperature ?? DEFAULT_TEMPERATURE,
        messages: [
          { role: "system", content: request.systemPrompt },
          { role: "user", content: request.prompt },
        ],
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new RemoteError("No response from OpenAI");
      }
      return content;
    } catch (err) {
      throw toRemoteError("chat completion", err);
    }
  }
}

export class OpenAIImageGenerator implements ImageGenerator {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly defaultSize: ImageSize,
  ) {}

  async generateImage(request: ImageRequest): Promise<string> {
    try {
      const response = await this.client.images.generate({
        model: this.model,
        prompt: request.prompt,
        size: request.size ?? this.defaultSize,
        n: 1,
      });

      const url = response.data?.[0]?.url;
      if (!url) {
        throw new RemoteError("OpenAI returned no image URL");
      }
      return url;
    } catch (err) {
      throw toRemoteError("image generation", err);
    }
  }
}
