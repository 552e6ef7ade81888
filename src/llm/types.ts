import type { ImageSize } from "../config.js";

export interface TextRequest {
  systemPrompt: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface TextGenerator {
  generate(request: TextRequest): Promise<string>;
}

export interface ImageRequest {
  prompt: string;
  size?: ImageSize;
}

export interface ImageGenerator {
  /** Resolves to the URL of the generated image. */
  generateImage(request: ImageRequest): Promise<string>;
}
