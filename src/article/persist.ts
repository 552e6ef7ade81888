import { promises as fs } from "node:fs";
import { basename, dirname, extname, join } from "node:path";
import { UserInputError } from "../errors.js";
import { formatFileDate } from "./dateUtils.js";

export function defaultOutputPath(prNumber: number, now: Date, timezone: string): string {
  return `blog_post_${prNumber}_${formatFileDate(now, timezone)}.md`;
}

/** `posts/blog.md` -> `posts/blog.png` */
export function imagePathFor(articlePath: string): string {
  const name = basename(articlePath, extname(articlePath));
  return join(dirname(articlePath), `${name}.png`);
}

export async function readArticle(path: string): Promise<string> {
  try {
    return await fs.readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new UserInputError(`Blog post file ${path} does not exist`);
    }
    throw error;
  }
}

/** Moves a file into place, copying when the two paths are on different devices. */
export async function moveFile(from: string, to: string): Promise<void> {
  await fs.mkdir(dirname(to), { recursive: true });
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EXDEV") {
      await fs.copyFile(from, to);
      await fs.rm(from, { force: true });
      return;
    }
    throw error;
  }
}

export async function writeArticle(path: string, markdown: string): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true });
  await fs.writeFile(path, markdown.endsWith("\n") ? markdown : `${markdown}\n`, "utf8");
}
