/** True when the text has both halves of a Markdown image reference. */
export function hasImageReference(markdown: string): boolean {
  return markdown.includes("![") && markdown.includes("](");
}

export function imageMarkdown(caption: string, url: string): string {
  const alt = caption.replace(/[[\]]/g, "").trim() || "Illustration";
  return `![${alt}](${url})`;
}

/**
 * Puts the image on the line right after the leading heading, with a blank
 * line before any body text. Without a heading as the first non-blank line,
 * the image goes first.
 */
export function insertImageAfterHeading(markdown: string, image: string): string {
  const lines = markdown.split("\n");
  const firstIndex = lines.findIndex((line) => line.trim().length > 0);

  if (firstIndex === -1 || !lines[firstIndex].trimStart().startsWith("#")) {
    return markdown.length > 0 ? `${image}\n\n${markdown}` : image;
  }

  const next: string | undefined = lines[firstIndex + 1];
  const block = next !== undefined && next.trim().length > 0 ? [image, ""] : [image];
  lines.splice(firstIndex + 1, 0, ...block);
  return lines.join("\n");
}
