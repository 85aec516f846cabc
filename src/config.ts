import Handlebars from "handlebars";
import { z } from "zod";

import { ConfigError, errorMessage } from "./errors.js";

export const DEFAULT_TITLE_TEMPLATE = "Weekly Links Digest - Week of {{date}}";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .default("false")
  .transform((v) => v === "true" || v === "1" || v === "yes");

const configSchema = z
  .object({
    // LinkAce
    linkaceUrl: z
      .string()
      .url()
      .transform((u) => u.replace(/\/+$/, "")),
    linkaceApiKey: z.string().min(1),
    linkaceListId: z.coerce.number().int().positive(),
    lookbackDays: z.coerce.number().int().positive().default(7),

    // LLM - at least one must be provided
    openrouterApiKey: z.string().optional(),
    openrouterModel: z.string().min(1).default("openrouter/auto"),
    openrouterBaseUrl: z.string().url().default("https://openrouter.ai/api/v1"),
    anthropicApiKey: z.string().optional(),
    anthropicModel: z.string().min(1).default("claude-haiku-4-5"),

    // Hugo output
    hugoContentDir: z.string().min(1).default("./content/posts"),
    outputFilenamePrefix: z
      .string()
      .regex(/^[a-z0-9][a-z0-9-]*$/i, "must be letters, digits and dashes")
      .default("weekly-links"),
    titleTemplate: z
      .string()
      .min(1)
      .default(DEFAULT_TITLE_TEMPLATE)
      .superRefine((source, ctx) => {
        try {
          Handlebars.parse(source);
        } catch (error) {
          const reason = errorMessage(error).split("\n")[0];
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `is not a valid Handlebars template (${reason})`,
          });
        }
      }),
    editorName: z.string().min(1).default("Editor"),
    overwrite: booleanFlag,
  })
  .refine((data) => data.openrouterApiKey || data.anthropicApiKey, {
    message: "Either OPENROUTER_API_KEY or ANTHROPIC_API_KEY must be provided",
  });

export type Config = z.infer<typeof configSchema>;

const ENV_NAMES: Record<string, string> = {
  linkaceUrl: "LINKACE_URL",
  linkaceApiKey: "LINKACE_API_KEY",
  linkaceListId: "LINKACE_LIST_ID",
  lookbackDays: "LOOKBACK_DAYS",
  openrouterApiKey: "OPENROUTER_API_KEY",
  openrouterModel: "OPENROUTER_MODEL",
  openrouterBaseUrl: "OPENROUTER_BASE_URL",
  anthropicApiKey: "ANTHROPIC_API_KEY",
  anthropicModel: "ANTHROPIC_MODEL",
  hugoContentDir: "HUGO_CONTENT_DIR",
  outputFilenamePrefix: "OUTPUT_FILENAME_PREFIX",
  titleTemplate: "POST_TITLE_TEMPLATE",
  editorName: "EDITOR_NAME",
  overwrite: "OVERWRITE",
};

/**
 * Empty strings in .env files mean "not set"
 */
function read(env: NodeJS.ProcessEnv, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key]?.trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * Validate the environment into a Config.
 * Throws ConfigError listing every problem at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    linkaceUrl: read(env, "LINKACE_URL", "LINKACE_BASE_URL"),
    linkaceApiKey: read(env, "LINKACE_API_KEY"),
    linkaceListId: read(env, "LINKACE_LIST_ID", "TARGET_LIST_ID"),
    lookbackDays: read(env, "LOOKBACK_DAYS"),
    openrouterApiKey: read(env, "OPENROUTER_API_KEY"),
    openrouterModel: read(env, "OPENROUTER_MODEL"),
    openrouterBaseUrl: read(env, "OPENROUTER_BASE_URL"),
    anthropicApiKey: read(env, "ANTHROPIC_API_KEY"),
    anthropicModel: read(env, "ANTHROPIC_MODEL"),
    hugoContentDir: read(env, "HUGO_CONTENT_DIR", "HUGO_CONTENT_PATH"),
    outputFilenamePrefix: read(env, "OUTPUT_FILENAME_PREFIX"),
    titleTemplate: read(env, "POST_TITLE_TEMPLATE"),
    editorName: read(env, "EDITOR_NAME"),
    overwrite: read(env, "OVERWRITE")?.toLowerCase(),
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const field = String(issue.path[0] ?? "");
        const name = ENV_NAMES[field] ?? (field || "config");
        return `${name}: ${issue.message}`;
      })
    );
  }

  return result.data;
}

/**
 * Determine which LLM provider to use
 */
export function getLLMProvider(config: Config): "openrouter" | "anthropic" {
  return config.openrouterApiKey ? "openrouter" : "anthropic";
}
