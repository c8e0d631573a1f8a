import type { ExtractedFiles, ExtractionStrategyName } from "../pipeline/types.js";

export interface ExtractionStrategy {
  name: ExtractionStrategyName;
  extract(text: string): ExtractedFiles;
}

// `=== index.html ===`; the name is one run of non-whitespace, non-`=` characters.
const SECTION_MARKER = /===[ \t]*([^\s=]+)[ \t]*===/;
const FENCE_OPENER = /^```[\w+#-]*[ \t]*\r?\n?/;
const FENCE_CLOSER = /\r?\n?```\s*$/;

// Filename-safe token (letters, digits, `_ - . /`) with an alphabetic extension,
// followed by a fenced block whose interior is captured.
const HEADING_FENCED_BLOCK =
  /(?:#{1,4}\s*|```[a-z]*\r?\n)([\w.\-\/]+\.[a-zA-Z]+)\r?\n```[a-zA-Z]*\r?\n([\s\S]*?)```/g;
const BOLD_FENCED_BLOCK =
  /\*\*([\w.\-\/]+\.[a-zA-Z]+)\*\*\s*\r?\n```[a-zA-Z]*\r?\n([\s\S]*?)```/g;

/**
 * Removes at most one opening fence line (with its language tag) and at most
 * one closing fence from already-trimmed section content.
 */
export function stripCodeFence(content: string): string {
  return content.replace(FENCE_OPENER, "").replace(FENCE_CLOSER, "");
}

export const delimitedSections: ExtractionStrategy = {
  name: "delimited-sections",
  extract(text) {
    const files: ExtractedFiles = new Map();
    // [preamble, name1, body1, name2, body2, ...]
    const parts = text.split(SECTION_MARKER);

    for (let i = 1; i < parts.length; i += 2) {
      const name = parts[i].trim();
      const body = i + 1 < parts.length ? parts[i + 1] : "";
      const content = stripCodeFence(body.trim()).trim();
      if (!name || !content) {
        continue;
      }
      files.set(name, content);
    }

    return files;
  },
};

export const headingFencedBlocks: ExtractionStrategy = {
  name: "heading-fenced-blocks",
  extract(text) {
    return collectFencedBlocks(text, HEADING_FENCED_BLOCK);
  },
};

export const boldFencedBlocks: ExtractionStrategy = {
  name: "bold-fenced-blocks",
  extract(text) {
    return collectFencedBlocks(text, BOLD_FENCED_BLOCK);
  },
};

/** Tried in this order; the first strategy that finds anything wins. */
export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  delimitedSections,
  headingFencedBlocks,
  boldFencedBlocks,
];

function collectFencedBlocks(text: string, pattern: RegExp): ExtractedFiles {
  const files: ExtractedFiles = new Map();
  for (const match of text.matchAll(pattern)) {
    files.set(match[1].trim(), match[2].trim());
  }
  return files;
}
