export interface WikiArticle {
  title: string;
  language: string;
  pageId: number;
  url: string;
  /** Plain-text extract, headings rendered as `== Heading ==`. */
  extract: string;
}

export type ContentFetchResult =
  | { kind: 'article'; article: WikiArticle }
  | { kind: 'disambiguation'; title: string; candidates: string[] }
  | { kind: 'not-found' };

export interface SearchHit {
  title: string;
  pageId: number;
  snippet: string;
  url: string;
}

export interface ContentSource {
  fetch(title: string, language: string): Promise<ContentFetchResult>;
  search(query: string, language: string, limit: number): Promise<SearchHit[]>;
}
