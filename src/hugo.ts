import { link, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import Handlebars from "handlebars";
import YAML from "yaml";

import { WriteError, errorMessage } from "./errors.js";
import type { Draft, FrontMatter, OutputDocument } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const TEMPLATES_DIR = join(__dirname, "..", "templates");

export const DEFAULT_TAGS = ["weekly-digest", "curated-links", "reading-list"];
const DESCRIPTION = "Weekly curated links and insights from my reading list";
const CATEGORIES = ["Weekly Digest", "Curated Links"];

export interface PostMeta {
  titleTemplate: string;
  editorName: string;
  now: Date;
}

/**
 * Format date as "January 2, 2026"
 */
export function formatDate(date: Date): string {
  return date.toLocaleDateString("en-US", {
    year: "numeric",
    month: "long",
    day: "numeric",
    timeZone: "UTC",
  });
}

/**
 * RFC 3339 in UTC, second precision
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function postFilename(now: Date, prefix: string): string {
  return `${now.toISOString().slice(0, 10)}-${prefix}.md`;
}

function escapeLinkText(text: string): string {
  return text.replace(/([[\]])/g, "\\$1");
}

function linkTarget(url: string): string {
  return /[\s()<>]/.test(url) ? `<${url.replace(/[<>]/g, encodeURIComponent)}>` : url;
}

/**
 * Markdown body: overview, then one section per heading with its links in draft order
 */
export function renderBody(draft: Draft): string {
  const lines: string[] = [];

  if (draft.overview) {
    lines.push(draft.overview);
    lines.push("");
  }

  for (const section of draft.sections) {
    lines.push(`## ${section.heading}`);
    lines.push("");

    if (section.summary) {
      lines.push(section.summary);
      lines.push("");
    }

    for (const item of section.items) {
      const link = `[${escapeLinkText(item.link.title)}](${linkTarget(item.link.url)})`;
      lines.push(item.summary ? `- ${link}: ${item.summary}` : `- ${link}`);
    }
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

export function buildOutputDocument(draft: Draft, meta: PostMeta): OutputDocument {
  const title = Handlebars.compile(meta.titleTemplate, { noEscape: true })({
    date: formatDate(meta.now),
  });

  const tags = [
    ...new Set(
      [...DEFAULT_TAGS, ...draft.tags].map((t) => t.trim().toLowerCase()).filter(Boolean)
    ),
  ];

  const frontMatter: FrontMatter = {
    title: title.trim(),
    date: formatTimestamp(meta.now),
    draft: false,
    description: DESCRIPTION,
    categories: [...CATEGORIES],
    tags,
    author: meta.editorName,
  };

  return { frontMatter, body: renderBody(draft) };
}

async function loadTemplate(): Promise<Handlebars.TemplateDelegate> {
  const templatePath = join(TEMPLATES_DIR, "post.md.hbs");
  const templateSource = await readFile(templatePath, "utf-8");
  return Handlebars.compile(templateSource, { noEscape: true });
}

/**
 * Render the full post: YAML front matter fenced by ---, then the body
 */
export async function renderMarkdown(doc: OutputDocument, linkCount: number): Promise<string> {
  const template = await loadTemplate();

  return template({
    frontMatter: YAML.stringify(doc.frontMatter),
    linkCount,
    body: doc.body,
  });
}

function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

async function removeTemp(temp: string): Promise<void> {
  await rm(temp, { force: true }).catch((cleanupError: unknown) => {
    console.warn(`Could not remove temporary file ${temp}: ${errorMessage(cleanupError)}`);
  });
}

export interface WritePostOptions {
  overwrite?: boolean;
}

/**
 * Write the post into the content directory. The file appears complete or not at all.
 * Without `overwrite` the temp file is hard-linked into place, which fails if the
 * target exists, even one created while we were writing.
 */
export async function writePost(
  contentDir: string,
  filename: string,
  content: string,
  options: WritePostOptions = {}
): Promise<string> {
  const target = join(contentDir, filename);

  try {
    await mkdir(contentDir, { recursive: true });
  } catch (error) {
    throw new WriteError(
      `Cannot create content directory ${contentDir}: ${errorMessage(error)}`,
      contentDir,
      error
    );
  }

  const temp = join(contentDir, `.${filename}.${process.pid}.tmp`);
  try {
    await writeFile(temp, content, { encoding: "utf-8", flag: "wx" });
  } catch (error) {
    await removeTemp(temp);
    throw new WriteError(`Cannot write ${target}: ${errorMessage(error)}`, target, error);
  }

  try {
    if (options.overwrite) {
      await rename(temp, target);
    } else {
      await link(temp, target);
    }
  } catch (error) {
    await removeTemp(temp);
    if (!options.overwrite && hasErrnoCode(error, "EEXIST")) {
      throw new WriteError(`${target} already exists (set OVERWRITE=true to replace it)`, target, error);
    }
    throw new WriteError(`Cannot write ${target}: ${errorMessage(error)}`, target, error);
  }

  if (!options.overwrite) await removeTemp(temp);

  return target;
}
