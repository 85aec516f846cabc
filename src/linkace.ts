import { z } from "zod";

import { FetchError, errorMessage } from "./errors.js";
import type { LinkAceLink, LinkRecord } from "./types.js";

const PAGE_SIZE = 100;
const DAY_MS = 24 * 60 * 60 * 1000;

const linkSchema = z.object({
  id: z.number().int(),
  url: z.string().min(1),
  title: z.string().nullable(),
  description: z.string().nullable().optional().default(null),
  created_at: z.string().refine((s) => !Number.isNaN(Date.parse(s)), "invalid date"),
  tags: z
    .array(z.object({ id: z.number().int(), name: z.string() }))
    .optional(),
});

const pageSchema = z.object({
  data: z.array(linkSchema),
  current_page: z.number().int().optional(),
  last_page: z.number().int().optional(),
  next_page_url: z.string().nullable().optional(),
});

type LinkPage = z.infer<typeof pageSchema>;

export interface LinkAceClientOptions {
  baseUrl: string;
  apiKey: string;
}

export interface FetchRecentLinksOptions {
  lookbackDays?: number;
  now?: Date;
}

/**
 * Transform LinkAce API link to internal format
 */
export function transformLink(raw: LinkAceLink): LinkRecord {
  const tags = [...new Set((raw.tags ?? []).map((t) => t.name.trim()).filter(Boolean))];
  const description = raw.description?.trim();

  return {
    id: raw.id,
    url: raw.url,
    title: raw.title?.trim() || raw.url,
    description: description || undefined,
    savedAt: new Date(raw.created_at),
    tags,
  };
}

export class LinkAceClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(options: LinkAceClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
  }

  /**
   * Fetch the links saved into a list within the lookback window,
   * newest first, in the order LinkAce returns them
   */
  async fetchRecentLinks(
    listId: number,
    options: FetchRecentLinksOptions = {}
  ): Promise<LinkRecord[]> {
    const { lookbackDays = 7, now = new Date() } = options;
    const cutoff = new Date(now.getTime() - lookbackDays * DAY_MS);
    const links: LinkRecord[] = [];

    let page = 1;
    for (;;) {
      const response = await this.fetchPage(listId, page);
      const records = response.data.map((raw) => transformLink(raw));

      links.push(...records.filter((r) => r.savedAt >= cutoff));

      // Sorted newest first: once a page reaches past the cutoff, later pages are older still
      const oldest = records.at(-1);
      const reachedCutoff = oldest !== undefined && oldest.savedAt < cutoff;
      const hasMore =
        response.next_page_url !== undefined
          ? response.next_page_url !== null
          : response.last_page !== undefined &&
            (response.current_page ?? page) < response.last_page;

      if (reachedCutoff || !hasMore || records.length === 0) break;
      page += 1;
    }

    return links;
  }

  private async fetchPage(listId: number, page: number): Promise<LinkPage> {
    const params = new URLSearchParams({
      per_page: String(PAGE_SIZE),
      order_by: "created_at",
      order_dir: "desc",
      page: String(page),
    });
    const url = `${this.baseUrl}/api/v2/lists/${listId}/links?${params.toString()}`;

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          Accept: "application/json",
        },
      });
    } catch (error) {
      throw new FetchError(`LinkAce request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      let body: string;
      try {
        body = (await response.text()).slice(0, 200);
      } catch (error) {
        throw new FetchError(
          `LinkAce API error ${response.status}: response body unreadable (${errorMessage(error)})`,
          { status: response.status, cause: error }
        );
      }
      throw new FetchError(`LinkAce API error ${response.status}: ${body}`, {
        status: response.status,
        body,
      });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new FetchError("LinkAce returned malformed JSON", {
        status: response.status,
        cause: error,
      });
    }

    const parsed = pageSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new FetchError(
        `Unexpected LinkAce response: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid shape"}`,
        { status: response.status, cause: parsed.error }
      );
    }

    return parsed.data;
  }
}
