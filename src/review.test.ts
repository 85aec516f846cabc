import { describe, expect, it, vi } from "vitest";

import { GenerationError, ReviewAbortedError } from "./errors.js";
import { REVIEW_HELP, formatDraft, parseCommand, reviewDraft, type Prompter } from "./review.js";
import type { Draft, LinkRecord } from "./types.js";

function link(id: number, title: string, url: string): LinkRecord {
  return { id, url, title, savedAt: new Date("2026-10-18T09:00:00Z"), tags: [] };
}

const linkA = link(1, "Title A", "https://a.example/one");
const linkB = link(2, "Title B", "https://b.example/two");
const linkC = link(3, "Title C", "https://c.example/three");

function sampleDraft(): Draft {
  return {
    overview: "A good week.",
    tags: ["ts"],
    sections: [
      {
        heading: "Tools",
        summary: "Handy things.",
        items: [
          { link: linkA, summary: "A summary" },
          { link: linkB, summary: "" },
        ],
      },
      {
        heading: "Reading",
        summary: "",
        items: [{ link: linkC, summary: "C summary" }],
      },
    ],
  };
}

function scripted(...answers: string[]): Prompter & { questions: string[] } {
  const questions: string[] = [];
  return {
    questions,
    async ask(question: string): Promise<string> {
      questions.push(question);
      const next = answers.shift();
      if (next === undefined) throw new Error("prompter ran out of answers");
      return next;
    },
    close() {},
  };
}

function collector() {
  const lines: string[] = [];
  return { lines, print: (line: string) => lines.push(line) };
}

describe("parseCommand", () => {
  it.each([
    ["", { kind: "approve" }],
    ["  ", { kind: "approve" }],
    ["a", { kind: "approve" }],
    ["Q", { kind: "abort" }],
    ["?", { kind: "help" }],
    ["r 2", { kind: "reject", section: 1 }],
    ["d 1.2", { kind: "remove", section: 0, item: 1 }],
    ["h 1 New heading", { kind: "heading", section: 0, text: "New heading" }],
    ["s 2 Shorter summary", { kind: "section-summary", section: 1, text: "Shorter summary" }],
    ["i 2.1 Better summary", { kind: "item-summary", section: 1, item: 0, text: "Better summary" }],
    ["o Fresh overview", { kind: "overview", text: "Fresh overview" }],
    ["t TS, node, ts,", { kind: "tags", tags: ["ts", "node"] }],
    ["f more jokes", { kind: "feedback", text: "more jokes" }],
    ["r", { kind: "invalid", message: "Usage: r N" }],
    ["d 1", { kind: "invalid", message: "Usage: d N.M" }],
    ["h 1", { kind: "invalid", message: "Usage: h N text" }],
    ["i 1 text", { kind: "invalid", message: "Usage: i N.M text" }],
    ["x", { kind: "invalid", message: 'Unknown command "x", type ? for help' }],
  ])("parses %j", (input, expected) => {
    expect(parseCommand(input)).toEqual(expected);
  });
});

describe("formatDraft", () => {
  it("numbers sections and items", () => {
    expect(formatDraft(sampleDraft())).toBe(
      [
        "Overview: A good week.",
        "Tags: ts",
        "",
        "[1] Tools",
        "    Handy things.",
        "    1.1 Title A <https://a.example/one>",
        "        A summary",
        "    1.2 Title B <https://b.example/two>",
        "",
        "[2] Reading",
        "    2.1 Title C <https://c.example/three>",
        "        C summary",
      ].join("\n")
    );
  });

  it("says when nothing is left", () => {
    expect(formatDraft({ overview: "", tags: [], sections: [] })).toBe(
      "Overview: (none)\nTags: (none)\n\n(no sections left)"
    );
  });
});

describe("reviewDraft", () => {
  it("returns the same draft when approved right away", async () => {
    const draft = sampleDraft();
    const out = collector();
    const prompter = scripted("");

    const approved = await reviewDraft(draft, { prompter, print: out.print });

    expect(approved).toBe(draft);
    expect(approved).toEqual(sampleDraft());
    expect(out.lines).toContain(formatDraft(sampleDraft()));
    expect(prompter.questions).toEqual(["Command (Enter to approve, ? for help): "]);
  });

  it("applies edits in place until approval", async () => {
    const draft = sampleDraft();
    const out = collector();

    await reviewDraft(draft, {
      prompter: scripted("d 1.2", "h 1 Renamed", "i 1.1 Crisper", "r 2", "o New overview", "t weekly, TS", "a"),
      print: out.print,
    });

    expect(draft).toEqual({
      overview: "New overview",
      tags: ["weekly", "ts"],
      sections: [
        {
          heading: "Renamed",
          summary: "Handy things.",
          items: [{ link: linkA, summary: "Crisper" }],
        },
      ],
    });
  });

  it("drops a section once its last item is removed", async () => {
    const draft = sampleDraft();

    await reviewDraft(draft, { prompter: scripted("d 2.1", ""), print: () => {} });

    expect(draft.sections.map((s) => s.heading)).toEqual(["Tools"]);
  });

  it("reports indices that point at nothing", async () => {
    const draft = sampleDraft();
    const out = collector();

    await reviewDraft(draft, { prompter: scripted("r 9", "d 1.7", "a"), print: out.print });

    expect(out.lines).toContain("No section 9");
    expect(out.lines).toContain("No item 1.7");
    expect(draft).toEqual(sampleDraft());
  });

  it("prints help", async () => {
    const out = collector();

    await reviewDraft(sampleDraft(), { prompter: scripted("?", ""), print: out.print });

    expect(out.lines).toContain(REVIEW_HELP);
  });

  it("points to d N.M for removing links in the help", () => {
    expect(REVIEW_HELP).toContain(
      "  f feedback       ask the LLM to revise the draft (links stay; remove them with d N.M)"
    );
  });

  it("aborts on q", async () => {
    await expect(
      reviewDraft(sampleDraft(), { prompter: scripted("q"), print: () => {} })
    ).rejects.toBeInstanceOf(ReviewAbortedError);
  });

  it("replaces the draft with an LLM revision", async () => {
    const draft = sampleDraft();
    const revised: Draft = {
      overview: "Revised",
      tags: [],
      sections: [{ heading: "All", summary: "", items: [{ link: linkA, summary: "" }] }],
    };
    const revise = vi.fn(async (_draft: Draft, _feedback: string) => revised);

    const approved = await reviewDraft(draft, {
      prompter: scripted("f merge everything", ""),
      print: () => {},
      reviser: { revise },
    });

    expect(revise).toHaveBeenCalledWith(draft, "merge everything");
    expect(approved).toBe(draft);
    expect(draft).toEqual(revised);
  });

  it("keeps the draft when a revision fails", async () => {
    const draft = sampleDraft();
    const out = collector();
    const revise = vi.fn(async (_draft: Draft, _feedback: string): Promise<Draft> => {
      throw new GenerationError("OpenRouter error 500: boom");
    });

    await reviewDraft(draft, {
      prompter: scripted("f shorter", ""),
      print: out.print,
      reviser: { revise },
    });

    expect(out.lines).toContain("Revision failed, keeping the current draft: OpenRouter error 500: boom");
    expect(draft).toEqual(sampleDraft());
  });

  it("says when revision is unavailable", async () => {
    const out = collector();

    await reviewDraft(sampleDraft(), { prompter: scripted("f shorter", ""), print: out.print });

    expect(out.lines).toContain("LLM revision is not available");
  });
});
