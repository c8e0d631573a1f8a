#!/usr/bin/env node
import { ConfigError, PipelineError } from "../pipeline/errors.js";
import { isRunSuccessful, runGenerateSitePipeline } from "../pipeline/generate-site.js";
import type { GenerateSiteOptions } from "../pipeline/types.js";
import { parseCliArgs, USAGE } from "./options.js";

function loadOptions(): GenerateSiteOptions {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error(USAGE);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const options = loadOptions();
  const summary = runGenerateSitePipeline(options);
  if (!isRunSuccessful(summary, options.strict)) {
    process.exitCode = 1;
  }
}

try {
  main();
} catch (error) {
  if (error instanceof PipelineError) {
    console.error(`Site generation failed [${error.code}]: ${error.message}`);
  } else {
    console.error("Site generation failed:", error);
  }
  process.exit(1);
}
