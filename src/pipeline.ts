import type { Config } from "./config.js";
import type { DraftGenerator } from "./drafter.js";
import { buildOutputDocument, postFilename, renderMarkdown, writePost } from "./hugo.js";
import type { LinkAceClient } from "./linkace.js";
import { reviewDraft, type Prompter } from "./review.js";

export type DigestSettings = Pick<
  Config,
  | "linkaceListId"
  | "lookbackDays"
  | "hugoContentDir"
  | "outputFilenamePrefix"
  | "titleTemplate"
  | "editorName"
  | "overwrite"
>;

export interface DigestDependencies {
  linkace: Pick<LinkAceClient, "fetchRecentLinks">;
  generator: Pick<DraftGenerator, "generate" | "revise">;
  prompter: Prompter;
  settings: DigestSettings;
  now?: Date;
  print?: (line: string) => void;
}

export type DigestResult =
  | { status: "written"; path: string; linkCount: number }
  | { status: "empty"; reason: string };

/**
 * Fetch, draft, review and export. Stops at the first error; nothing is
 * written unless every earlier stage succeeded.
 */
export async function runDigest(deps: DigestDependencies): Promise<DigestResult> {
  const { linkace, generator, prompter, settings } = deps;
  const now = deps.now ?? new Date();
  const startTime = Date.now();

  // 1. Fetch
  console.log(`Fetching links from LinkAce list ${settings.linkaceListId}...`);
  const links = await linkace.fetchRecentLinks(settings.linkaceListId, {
    lookbackDays: settings.lookbackDays,
    now,
  });
  console.log(`Found ${links.length} links from the past ${settings.lookbackDays} days`);

  if (links.length === 0) {
    return { status: "empty", reason: "No links saved in the window, nothing to export" };
  }

  // 2. Draft
  const draft = await generator.generate(links);
  console.log(`Draft has ${draft.sections.length} sections`);

  // 3. Review
  const approved = await reviewDraft(draft, {
    prompter,
    reviser: generator,
    print: deps.print,
  });

  const linkCount = approved.sections.reduce((n, s) => n + s.items.length, 0);
  if (linkCount === 0) {
    return { status: "empty", reason: "Every link was removed during review, nothing to export" };
  }

  // 4. Export
  console.log("Generating Hugo markdown file...");
  const doc = buildOutputDocument(approved, {
    titleTemplate: settings.titleTemplate,
    editorName: settings.editorName,
    now,
  });
  const markdown = await renderMarkdown(doc, linkCount);
  const path = await writePost(
    settings.hugoContentDir,
    postFilename(now, settings.outputFilenamePrefix),
    markdown,
    { overwrite: settings.overwrite }
  );

  const duration = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`Hugo content saved to ${path} in ${duration}s`);

  return { status: "written", path, linkCount };
}
