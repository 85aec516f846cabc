/**
 * Raw link structure from the LinkAce v2 API
 */
export interface LinkAceLink {
  id: number;
  url: string;
  title: string | null;
  description: string | null;
  created_at: string;
  tags?: Array<{
    id: number;
    name: string;
  }>;
}

/**
 * Internal link representation
 */
export interface LinkRecord {
  readonly id: number;
  readonly url: string;
  readonly title: string;
  readonly description?: string;
  readonly savedAt: Date;
  readonly tags: readonly string[];
}

export interface DraftItem {
  link: LinkRecord;
  summary: string;
}

export interface DraftSection {
  heading: string;
  summary: string;
  items: DraftItem[];
}

/**
 * LLM-structured grouping of the week's links, edited during review
 */
export interface Draft {
  overview: string;
  tags: string[];
  sections: DraftSection[];
}

/**
 * Hugo front matter, keys in the order they are written
 */
export interface FrontMatter {
  title: string;
  date: string;
  draft: boolean;
  description: string;
  categories: string[];
  tags: string[];
  author: string;
}

export interface OutputDocument {
  frontMatter: FrontMatter;
  body: string;
}

export interface CompletionOptions {
  system?: string;
  temperature: number;
  maxTokens: number;
}

/**
 * LLM provider interface for abstraction
 */
export interface LLMProvider {
  readonly name: string;
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

/**
 * Draft as the LLM returns it, before items are matched to fetched links
 */
export interface DraftResponse {
  overview: string;
  tags: string[];
  sections: Array<{
    heading: string;
    summary: string;
    items: Array<{
      url: string;
      summary: string;
    }>;
  }>;
}
