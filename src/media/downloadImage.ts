import { createWriteStream, promises as fs } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { fetch } from "undici";
import { ImageTransferError, extractError } from "../errors.js";
import { detail, warn } from "../progress.js";
import { retryWith } from "../util/retry.js";

export const MAX_DOWNLOAD_ATTEMPTS = 3;

export interface DownloadOptions {
  timeoutMs?: number;
  attempts?: number;
  /** Delay before the first retry; tests pass 0. */
  retryDelayMs?: number;
}

export function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

async function transferOnce(url: string, destination: string, timeoutMs: number): Promise<void> {
  const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });

  if (!response.ok) {
    throw new ImageTransferError(`Image request failed with status ${response.status}`, true);
  }

  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.toLowerCase().startsWith("image/")) {
    throw new ImageTransferError(
      `URL does not point to an image (content-type: ${contentType || "none"})`,
      false,
    );
  }

  if (!response.body) {
    throw new ImageTransferError("Image response has no body", true);
  }

  // Each attempt writes a fresh temp file; the destination only ever sees a verified image.
  const partial = `${destination}.part`;
  try {
    await pipeline(Readable.fromWeb(response.body), createWriteStream(partial));

    const stats = await fs.stat(partial);
    if (stats.size === 0) {
      throw new ImageTransferError("Downloaded image is empty", true);
    }
    await fs.rename(partial, destination);
  } catch (err) {
    await fs.rm(partial, { force: true });
    throw err;
  }
}

function isRetryable(error: Error): boolean {
  return error instanceof ImageTransferError ? error.retryable : true;
}

/**
 * Downloads an image to `destination`. Resolves to false on any failure and
 * never throws.
 */
export async function downloadImage(
  url: string,
  destination: string,
  options: DownloadOptions = {},
): Promise<boolean> {
  if (!isHttpUrl(url)) {
    warn(`Refusing to download image from non-HTTP URL: ${url}`);
    return false;
  }

  const timeoutMs = options.timeoutMs ?? 30_000;

  try {
    await retryWith(() => transferOnce(url, destination, timeoutMs), {
      attempts: options.attempts ?? MAX_DOWNLOAD_ATTEMPTS,
      minTimeout: options.retryDelayMs ?? 1000,
      isRetryable,
      onRetry: (error, attempt, attemptsLeft) => {
        detail(`Image download attempt ${attempt} failed (${error.message}); ${attemptsLeft} left`);
      },
    });
    return true;
  } catch (err) {
    warn(`Image download failed: ${extractError(err)}`);
    return false;
  }
}
