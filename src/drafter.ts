import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { ParseError } from "./errors.js";
import type { Draft, DraftItem, DraftResponse, DraftSection, LinkRecord, LLMProvider } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = join(__dirname, "..", "prompts");

export const MORE_LINKS_HEADING = "More Links";

const GENERATE_TEMPERATURE = 0.7;
const REVISE_TEMPERATURE = 0.5;
const MAX_TOKENS = 4096;

const text = z
  .string()
  .nullish()
  .transform((v) => (v ?? "").trim());

const draftResponseSchema = z.object({
  overview: text,
  tags: z.array(z.string()).nullish().transform((v) => v ?? []),
  sections: z.array(
    z.object({
      heading: z.string().trim().min(1),
      summary: text,
      items: z.array(
        z.object({
          url: z.string().trim().min(1),
          summary: text,
        })
      ),
    })
  ),
});

/**
 * Load prompt template from file
 */
function loadPrompt(name: string): string {
  const path = join(PROMPTS_DIR, `${name}.txt`);
  return readFileSync(path, "utf-8").trim();
}

/**
 * Fill {{KEY}} placeholders; values are inserted literally
 */
function fillPrompt(template: string, values: Record<string, string>): string {
  let prompt = template;
  for (const [key, value] of Object.entries(values)) {
    prompt = prompt.replace(`{{${key}}}`, () => value);
  }
  return prompt;
}

/**
 * Compare URLs the way a human would: host case and trailing slashes don't matter
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  try {
    return new URL(trimmed).toString().replace(/\/+$/, "");
  } catch {
    return trimmed.replace(/\/+$/, "");
  }
}

function formatLink(link: LinkRecord, index: number): string {
  return [
    `[${index + 1}] ${link.title}`,
    `URL: ${link.url}`,
    `Description: ${link.description ?? "(none)"}`,
    `Tags: ${link.tags.length > 0 ? link.tags.join(", ") : "(none)"}`,
    `Saved: ${link.savedAt.toISOString()}`,
  ].join("\n");
}

/**
 * Build the digest prompt; the same links always give the same prompt
 */
export function buildDigestPrompt(links: readonly LinkRecord[]): string {
  return fillPrompt(loadPrompt("weekly-digest"), {
    COUNT: String(links.length),
    LINKS: links.map(formatLink).join("\n---\n"),
  });
}

export function buildRevisionPrompt(draft: Draft, feedback: string): string {
  const serialized = {
    overview: draft.overview,
    tags: draft.tags,
    sections: draft.sections.map((section) => ({
      heading: section.heading,
      summary: section.summary,
      items: section.items.map((item) => ({
        url: item.link.url,
        title: item.link.title,
        summary: item.summary,
      })),
    })),
  };

  return fillPrompt(loadPrompt("revise-digest"), {
    DRAFT: JSON.stringify(serialized, null, 2),
    FEEDBACK: feedback.trim(),
  });
}

/**
 * Parse JSON from LLM response, handling potential markdown wrapping
 */
export function parseDraftResponse(response: string): DraftResponse {
  let cleaned = response.trim();

  if (cleaned.startsWith("```json")) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith("```")) {
    cleaned = cleaned.slice(3);
  }

  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3);
  }

  cleaned = cleaned.trim();

  // Some models still wrap the object in a sentence
  if (!cleaned.startsWith("{")) {
    const start = cleaned.indexOf("{");
    const end = cleaned.lastIndexOf("}");
    if (start !== -1 && end > start) {
      cleaned = cleaned.slice(start, end + 1);
    }
  }

  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch (error) {
    throw new ParseError("LLM response is not valid JSON", response, error);
  }

  const parsed = draftResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "response"}: ${issue.message}` : "invalid shape";
    throw new ParseError(`LLM response has no usable section structure (${where})`, response, parsed.error);
  }

  return parsed.data;
}

export interface ReconcileResult {
  draft: Draft;
  /** URLs the LLM returned that were never fetched; dropped */
  unknownUrls: string[];
  /** Links the LLM left out; placed in a trailing section */
  unplaced: LinkRecord[];
}

/**
 * Match response items to fetched links so every link lands in exactly one section
 */
export function reconcileDraft(
  response: DraftResponse,
  links: readonly LinkRecord[]
): ReconcileResult {
  const byUrl = new Map<string, LinkRecord>();
  for (const link of links) {
    const key = normalizeUrl(link.url);
    if (!byUrl.has(key)) byUrl.set(key, link);
  }

  const placed = new Set<LinkRecord>();
  const unknownUrls: string[] = [];
  const sections: DraftSection[] = [];

  for (const section of response.sections) {
    const items: DraftItem[] = [];
    for (const item of section.items) {
      const link = byUrl.get(normalizeUrl(item.url));
      if (!link) {
        unknownUrls.push(item.url);
        continue;
      }
      if (placed.has(link)) continue;

      placed.add(link);
      items.push({ link, summary: item.summary });
    }

    if (items.length > 0) {
      sections.push({ heading: section.heading, summary: section.summary, items });
    }
  }

  const unplaced = links.filter((link) => !placed.has(link));
  if (unplaced.length > 0) {
    sections.push({
      heading: MORE_LINKS_HEADING,
      summary: "",
      items: unplaced.map((link) => ({ link, summary: link.description ?? "" })),
    });
  }

  return {
    draft: {
      overview: response.overview,
      tags: [...new Set(response.tags.map((t) => t.trim().toLowerCase()).filter(Boolean))],
      sections,
    },
    unknownUrls,
    unplaced,
  };
}

function collectLinks(draft: Draft): LinkRecord[] {
  return draft.sections.flatMap((section) => section.items.map((item) => item.link));
}

/**
 * Turns fetched links into a reviewable Draft through one LLM call
 */
export class DraftGenerator {
  constructor(private readonly provider: LLMProvider) {}

  async generate(links: readonly LinkRecord[]): Promise<Draft> {
    if (links.length === 0) {
      return { overview: "", tags: [], sections: [] };
    }

    console.log(`Asking ${this.provider.name} to structure ${links.length} links...`);
    const response = await this.provider.complete(buildDigestPrompt(links), {
      system: loadPrompt("system"),
      temperature: GENERATE_TEMPERATURE,
      maxTokens: MAX_TOKENS,
    });

    return this.toDraft(response, links);
  }

  /**
   * Rework a draft from editor feedback. Links already removed stay removed.
   */
  async revise(draft: Draft, feedback: string): Promise<Draft> {
    const links = collectLinks(draft);
    if (links.length === 0) return draft;

    console.log(`Asking ${this.provider.name} to revise the draft...`);
    const response = await this.provider.complete(buildRevisionPrompt(draft, feedback), {
      system: loadPrompt("system"),
      temperature: REVISE_TEMPERATURE,
      maxTokens: MAX_TOKENS,
    });

    return this.toDraft(response, links);
  }

  private toDraft(response: string, links: readonly LinkRecord[]): Draft {
    const result = reconcileDraft(parseDraftResponse(response), links);

    if (result.unknownUrls.length > 0) {
      console.warn(
        `Dropped ${result.unknownUrls.length} link(s) the LLM invented: ${result.unknownUrls.join(", ")}`
      );
    }
    if (result.unplaced.length > 0) {
      console.warn(`LLM left out ${result.unplaced.length} link(s); added them under "${MORE_LINKS_HEADING}"`);
    }

    return result.draft;
  }
}
