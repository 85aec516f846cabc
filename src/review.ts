import { createInterface } from "node:readline/promises";

import { GenerationError, ReviewAbortedError } from "./errors.js";
import type { Draft } from "./types.js";

/**
 * Blocking question/answer channel to the editor
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export interface DraftReviser {
  revise(draft: Draft, feedback: string): Promise<Draft>;
}

export interface ReviewOptions {
  prompter: Prompter;
  print?: (line: string) => void;
  /** Enables the `f` command; usually the DraftGenerator */
  reviser?: DraftReviser;
}

export type ReviewCommand =
  | { kind: "approve" }
  | { kind: "abort" }
  | { kind: "help" }
  | { kind: "reject"; section: number }
  | { kind: "remove"; section: number; item: number }
  | { kind: "heading"; section: number; text: string }
  | { kind: "section-summary"; section: number; text: string }
  | { kind: "item-summary"; section: number; item: number; text: string }
  | { kind: "overview"; text: string }
  | { kind: "tags"; tags: string[] }
  | { kind: "feedback"; text: string }
  | { kind: "invalid"; message: string };

export const REVIEW_HELP = [
  "Commands:",
  "  Enter / a        approve the draft",
  "  r N              reject section N",
  "  d N.M            remove item M of section N",
  "  h N text         set the heading of section N",
  "  s N text         set the summary of section N",
  "  i N.M text       set the summary of item M in section N",
  "  o text           set the overview paragraph",
  "  t tag, tag       set the suggested tags",
  "  f feedback       ask the LLM to revise the draft (links stay; remove them with d N.M)",
  "  ?                show this help",
  "  q                abort without writing anything",
].join("\n");

function parseSection(token: string | undefined): number | null {
  if (!token || !/^\d+$/.test(token)) return null;
  return Number(token) - 1;
}

function parseItem(token: string | undefined): { section: number; item: number } | null {
  const match = token?.match(/^(\d+)\.(\d+)$/);
  if (!match) return null;
  return { section: Number(match[1]) - 1, item: Number(match[2]) - 1 };
}

/**
 * Split "cmd arg rest..." where arg is a section or item index
 */
function splitIndexed(rest: string): { index: string | undefined; text: string } {
  const match = rest.match(/^(\S+)\s*([\s\S]*)$/);
  return { index: match?.[1], text: (match?.[2] ?? "").trim() };
}

export function parseCommand(input: string): ReviewCommand {
  const trimmed = input.trim();
  if (trimmed === "") return { kind: "approve" };

  const match = trimmed.match(/^(\S+)\s*([\s\S]*)$/);
  const name = (match?.[1] ?? "").toLowerCase();
  const rest = (match?.[2] ?? "").trim();

  switch (name) {
    case "a":
    case "approve":
    case "y":
    case "yes":
      return { kind: "approve" };
    case "q":
    case "quit":
    case "abort":
      return { kind: "abort" };
    case "?":
    case "help":
      return { kind: "help" };
    case "r": {
      const section = parseSection(rest);
      return section === null
        ? { kind: "invalid", message: "Usage: r N" }
        : { kind: "reject", section };
    }
    case "d": {
      const target = parseItem(rest);
      return target === null
        ? { kind: "invalid", message: "Usage: d N.M" }
        : { kind: "remove", ...target };
    }
    case "h":
    case "s": {
      const { index, text } = splitIndexed(rest);
      const section = parseSection(index);
      if (section === null || !text) {
        return { kind: "invalid", message: `Usage: ${name} N text` };
      }
      return name === "h"
        ? { kind: "heading", section, text }
        : { kind: "section-summary", section, text };
    }
    case "i": {
      const { index, text } = splitIndexed(rest);
      const target = parseItem(index);
      if (target === null || !text) {
        return { kind: "invalid", message: "Usage: i N.M text" };
      }
      return { kind: "item-summary", ...target, text };
    }
    case "o":
      return rest ? { kind: "overview", text: rest } : { kind: "invalid", message: "Usage: o text" };
    case "t":
      return {
        kind: "tags",
        tags: [...new Set(rest.split(",").map((t) => t.trim().toLowerCase()).filter(Boolean))],
      };
    case "f":
      return rest ? { kind: "feedback", text: rest } : { kind: "invalid", message: "Usage: f feedback" };
    default:
      return { kind: "invalid", message: `Unknown command "${name}", type ? for help` };
  }
}

/**
 * Numbered plain-text view of the draft
 */
export function formatDraft(draft: Draft): string {
  const lines: string[] = [];

  lines.push(`Overview: ${draft.overview || "(none)"}`);
  lines.push(`Tags: ${draft.tags.length > 0 ? draft.tags.join(", ") : "(none)"}`);

  draft.sections.forEach((section, si) => {
    lines.push("");
    lines.push(`[${si + 1}] ${section.heading}`);
    if (section.summary) lines.push(`    ${section.summary}`);

    section.items.forEach((item, ii) => {
      lines.push(`    ${si + 1}.${ii + 1} ${item.link.title} <${item.link.url}>`);
      if (item.summary) lines.push(`        ${item.summary}`);
    });
  });

  if (draft.sections.length === 0) {
    lines.push("");
    lines.push("(no sections left)");
  }

  return lines.join("\n");
}

/**
 * Apply an editing command to the draft in place.
 * Returns an error message when the command points at nothing.
 */
export function applyEdit(draft: Draft, command: ReviewCommand): string | null {
  if (command.kind === "overview") {
    draft.overview = command.text;
    return null;
  }
  if (command.kind === "tags") {
    draft.tags = command.tags;
    return null;
  }
  if (
    command.kind !== "reject" &&
    command.kind !== "remove" &&
    command.kind !== "heading" &&
    command.kind !== "section-summary" &&
    command.kind !== "item-summary"
  ) {
    return `"${command.kind}" is not an edit`;
  }

  const section = draft.sections[command.section];
  if (!section) return `No section ${command.section + 1}`;

  switch (command.kind) {
    case "reject":
      draft.sections.splice(command.section, 1);
      return null;
    case "heading":
      section.heading = command.text;
      return null;
    case "section-summary":
      section.summary = command.text;
      return null;
    case "remove":
    case "item-summary": {
      const item = section.items[command.item];
      if (!item) return `No item ${command.section + 1}.${command.item + 1}`;

      if (command.kind === "item-summary") {
        item.summary = command.text;
        return null;
      }

      section.items.splice(command.item, 1);
      if (section.items.length === 0) {
        draft.sections.splice(command.section, 1);
      }
      return null;
    }
  }
}

function replaceDraft(target: Draft, source: Draft): void {
  target.overview = source.overview;
  target.tags = source.tags;
  target.sections = source.sections;
}

/**
 * Show the draft to the editor and apply their commands until they approve.
 * The draft is edited in place and returned.
 */
export async function reviewDraft(draft: Draft, options: ReviewOptions): Promise<Draft> {
  const { prompter, reviser } = options;
  const print = options.print ?? ((line: string) => console.log(line));

  print("=".repeat(80));
  print("EDITOR REVIEW");
  print("=".repeat(80));

  let showDraft = true;

  for (;;) {
    if (showDraft) {
      print(formatDraft(draft));
      print("-".repeat(40));
      showDraft = false;
    }

    const command = parseCommand(await prompter.ask("Command (Enter to approve, ? for help): "));

    switch (command.kind) {
      case "approve":
        return draft;
      case "abort":
        throw new ReviewAbortedError();
      case "help":
        print(REVIEW_HELP);
        break;
      case "invalid":
        print(command.message);
        break;
      case "feedback": {
        if (!reviser) {
          print("LLM revision is not available");
          break;
        }
        try {
          replaceDraft(draft, await reviser.revise(draft, command.text));
          showDraft = true;
        } catch (error) {
          if (!(error instanceof GenerationError)) throw error;
          print(`Revision failed, keeping the current draft: ${error.message}`);
        }
        break;
      }
      default: {
        const problem = applyEdit(draft, command);
        if (problem) {
          print(problem);
        } else {
          showDraft = true;
        }
      }
    }
  }
}

/**
 * Prompter on stdin/stdout. Closing the input (Ctrl+D) aborts the review.
 */
export function createTerminalPrompter(): Prompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const closed = new AbortController();
  rl.on("close", () => closed.abort());

  return {
    async ask(question: string): Promise<string> {
      if (closed.signal.aborted) throw new ReviewAbortedError();
      try {
        return await rl.question(question, { signal: closed.signal });
      } catch (error) {
        if (closed.signal.aborted) throw new ReviewAbortedError();
        throw error;
      }
    },
    close(): void {
      rl.close();
    },
  };
}
