import { describe, it, expect } from "vitest";
import {
  hasImageReference,
  imageMarkdown,
  insertImageAfterHeading,
} from "../src/article/markdownImages.js";

const IMAGE = "![cover](cover.png)";

describe("insertImageAfterHeading", () => {
  it("should place the image on the line right after a leading heading", () => {
    expect(insertImageAfterHeading("# Title\n\nBody", IMAGE)).toBe(
      "# Title\n![cover](cover.png)\n\nBody",
    );
  });

  it("should add a blank line when the body follows the heading directly", () => {
    expect(insertImageAfterHeading("## Title\nBody", IMAGE)).toBe(
      "## Title\n![cover](cover.png)\n\nBody",
    );
  });

  it("should skip leading blank lines to find the heading", () => {
    expect(insertImageAfterHeading("\n# Title", IMAGE)).toBe("\n# Title\n![cover](cover.png)");
  });

  it("should put the image first when there is no heading", () => {
    expect(insertImageAfterHeading("Intro text\n", IMAGE)).toBe(
      "![cover](cover.png)\n\nIntro text\n",
    );
    expect(insertImageAfterHeading("", IMAGE)).toBe(IMAGE);
  });
});

describe("hasImageReference", () => {
  it("should need both halves of the image syntax", () => {
    expect(hasImageReference("see ![alt](x.png)")).toBe(true);
    expect(hasImageReference("a [link](x)")).toBe(false);
    expect(hasImageReference("![ unfinished")).toBe(false);
  });
});

describe("imageMarkdown", () => {
  it("should strip brackets from the caption", () => {
    expect(imageMarkdown("Add [beta] cache", "a.png")).toBe("![Add beta cache](a.png)");
    expect(imageMarkdown("[]", "a.png")).toBe("![Illustration](a.png)");
  });
});
