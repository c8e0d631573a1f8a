import type { ExtractedFiles, ExtractionResult } from "../pipeline/types.js";
import { EXTRACTION_STRATEGIES, type ExtractionStrategy } from "./strategies.js";

export const DEFAULT_FILENAME = "index.html";

export interface ExtractOptions {
  /** File that receives the whole response when no strategy matches. */
  defaultFilename?: string;
  onWarning?: (message: string) => void;
  strategies?: readonly ExtractionStrategy[];
}

/**
 * Splits a generated response into files. Never throws and never returns an
 * empty map: when no strategy recognizes anything, the untrimmed input is kept
 * under the default filename and `onWarning` fires once.
 */
export function extractFiles(text: string, options: ExtractOptions = {}): ExtractionResult {
  const strategies = options.strategies ?? EXTRACTION_STRATEGIES;

  for (const strategy of strategies) {
    const files = strategy.extract(text);
    if (files.size > 0) {
      return { files, strategy: strategy.name, usedFallback: false };
    }
  }

  const defaultFilename = options.defaultFilename ?? DEFAULT_FILENAME;
  options.onWarning?.(
    `Could not parse named file sections; saving full response as ${defaultFilename}`
  );
  const files: ExtractedFiles = new Map([[defaultFilename, text]]);
  return { files, strategy: "fallback", usedFallback: true };
}
