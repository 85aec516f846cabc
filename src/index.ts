#!/usr/bin/env node
import { config as loadEnv } from "dotenv";

import { loadConfig, type Config } from "./config.js";
import { DraftGenerator } from "./drafter.js";
import { ConfigError, DigestError, errorMessage } from "./errors.js";
import { LinkAceClient } from "./linkace.js";
import { createProvider } from "./llm.js";
import { runDigest } from "./pipeline.js";
import { createTerminalPrompter } from "./review.js";

async function run(config: Config): Promise<void> {
  const linkace = new LinkAceClient({
    baseUrl: config.linkaceUrl,
    apiKey: config.linkaceApiKey,
  });
  const generator = new DraftGenerator(createProvider(config));
  const prompter = createTerminalPrompter();

  try {
    const result = await runDigest({
      linkace,
      generator,
      prompter,
      settings: config,
    });

    if (result.status === "empty") {
      console.log(result.reason);
      return;
    }

    console.log(`Complete! ${result.linkCount} links exported to ${result.path}`);
    console.log("Run 'hugo server' in your Hugo directory to preview");
  } finally {
    prompter.close();
  }
}

/**
 * Entry point
 */
async function main(): Promise<void> {
  console.log("LinkAce Weekly v1.0.0");
  console.log("");

  loadEnv();

  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(errorMessage(error));
    if (error instanceof ConfigError) {
      console.error("\nPlease set the required environment variables (see .env.example).");
    }
    process.exit(1);
  }

  try {
    await run(config);
    process.exit(0);
  } catch (error) {
    if (error instanceof DigestError) {
      console.error(`${error.name}: ${error.message}`);
    } else {
      console.error("Digest generation failed:", error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("Unexpected failure:", error);
  process.exit(1);
});
