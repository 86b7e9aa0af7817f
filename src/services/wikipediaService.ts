import axios from 'axios';
import { z } from 'zod';
import { ContentFetchResult, ContentSource, SearchHit } from '../types/content';
import { Logger, logger as rootLogger } from '../utils/logger';
import { MalformedRequestError, PipelineError } from '../utils/pipelineErrors';
import { classifyProviderError } from '../utils/providerErrorMapper';

export type HttpGet = (url: string, params: Record<string, string | number>) => Promise<unknown>;

export interface WikipediaServiceOptions {
  userAgent: string;
  http?: HttpGet;
  logger?: Logger;
  timeoutMs?: number;
}

const PageSchema = z.object({
  pageid: z.number().optional(),
  title: z.string(),
  missing: z.boolean().optional(),
  invalid: z.boolean().optional(),
  extract: z.string().optional(),
  fullurl: z.string().optional(),
  pageprops: z.object({ disambiguation: z.string().optional() }).passthrough().optional(),
  links: z.array(z.object({ ns: z.number(), title: z.string() })).optional(),
});

const ApiErrorSchema = z.object({ code: z.string(), info: z.string().optional() });

const ArticleResponseSchema = z.object({
  error: ApiErrorSchema.optional(),
  query: z.object({ pages: z.array(PageSchema) }).optional(),
});

const LinksResponseSchema = z.object({
  error: ApiErrorSchema.optional(),
  continue: z.object({ plcontinue: z.string().optional(), continue: z.string().optional() }).passthrough().optional(),
  query: z.object({ pages: z.array(PageSchema) }).optional(),
});

// A disambiguation page rarely needs more than a couple of 500-link batches
const MAX_LINK_BATCHES = 10;

const SearchResponseSchema = z.object({
  error: ApiErrorSchema.optional(),
  query: z
    .object({
      search: z.array(z.object({ title: z.string(), pageid: z.number(), snippet: z.string().default('') })),
    })
    .optional(),
});

export function apiEndpoint(language: string): string {
  return `https://${language}.wikipedia.org/w/api.php`;
}

export function articleUrl(title: string, language: string): string {
  return `https://${language}.wikipedia.org/wiki/${encodeURIComponent(title.replace(/ /g, '_'))}`;
}

function stripTags(html: string): string {
  return html
    .replace(/<[^>]+>/g, '')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Wikipedia content source over the MediaWiki Action API (`action=query`).
 * Every response is validated with zod before use.
 */
export class WikipediaService implements ContentSource {
  private readonly http: HttpGet;
  private readonly log: Logger;

  constructor(options: WikipediaServiceOptions) {
    this.log = (options.logger ?? rootLogger).child({ component: 'wikipedia' });
    this.http =
      options.http ??
      (async (url, params) => {
        const response = await axios.get<unknown>(url, {
          params,
          headers: { 'User-Agent': options.userAgent, 'Api-User-Agent': options.userAgent },
          timeout: options.timeoutMs ?? 15000,
        });
        return response.data;
      });
  }

  private async query<T>(
    language: string,
    params: Record<string, string | number>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    let raw: unknown;
    try {
      raw = await this.http(apiEndpoint(language), { action: 'query', format: 'json', formatversion: 2, ...params });
    } catch (err) {
      const classified: PipelineError = classifyProviderError(err, 'wikipedia');
      this.log.warn({ language, code: classified.code, err: classified.message }, 'Wikipedia request failed');
      throw classified;
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedRequestError(`Unexpected Wikipedia response: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        provider: 'wikipedia',
      });
    }
    return parsed.data;
  }

  async fetch(title: string, language: string): Promise<ContentFetchResult> {
    const response = await this.query(
      language,
      {
        prop: 'extracts|pageprops|info',
        titles: title,
        explaintext: 1,
        exsectionformat: 'wiki',
        redirects: 1,
        inprop: 'url',
        ppprop: 'disambiguation',
      },
      ArticleResponseSchema
    );
    if (response.error) {
      if (response.error.code === 'invalidtitle') return { kind: 'not-found' };
      throw new MalformedRequestError(`Wikipedia: ${response.error.info ?? response.error.code}`, { provider: 'wikipedia' });
    }

    const page = response.query?.pages[0];
    if (!page || page.missing || page.invalid || page.pageid === undefined) {
      this.log.info({ title, language }, 'Article not found');
      return { kind: 'not-found' };
    }

    if (page.pageprops?.disambiguation !== undefined) {
      const candidates = await this.disambiguationLinks(page.title, language);
      this.log.info({ title: page.title, language, candidates: candidates.length }, 'Disambiguation page');
      return { kind: 'disambiguation', title: page.title, candidates };
    }

    return {
      kind: 'article',
      article: {
        title: page.title,
        language,
        pageId: page.pageid,
        url: page.fullurl ?? articleUrl(page.title, language),
        extract: page.extract ?? '',
      },
    };
  }

  /** Article-namespace links of a disambiguation page, following `plcontinue` across batches. */
  private async disambiguationLinks(title: string, language: string): Promise<string[]> {
    const candidates: string[] = [];
    let cursor: Record<string, string> = {};
    for (let batch = 0; batch < MAX_LINK_BATCHES; batch++) {
      const response = await this.query(
        language,
        { prop: 'links', titles: title, plnamespace: 0, pllimit: 'max', ...cursor },
        LinksResponseSchema
      );
      if (response.error) {
        throw new MalformedRequestError(`Wikipedia: ${response.error.info ?? response.error.code}`, { provider: 'wikipedia' });
      }
      for (const link of response.query?.pages[0]?.links ?? []) {
        if (link.ns === 0 && !candidates.includes(link.title)) candidates.push(link.title);
      }
      const plcontinue = response.continue?.plcontinue;
      if (!plcontinue) return candidates;
      cursor = { plcontinue, continue: response.continue?.continue ?? '' };
    }
    this.log.warn({ title, language, candidates: candidates.length }, 'Disambiguation links truncated');
    return candidates;
  }

  async search(query: string, language: string, limit: number): Promise<SearchHit[]> {
    const response = await this.query(
      language,
      { list: 'search', srsearch: query, srlimit: limit, srnamespace: 0, srprop: 'snippet' },
      SearchResponseSchema
    );
    if (response.error) {
      throw new MalformedRequestError(`Wikipedia: ${response.error.info ?? response.error.code}`, { provider: 'wikipedia' });
    }
    return (response.query?.search ?? []).map((hit) => ({
      title: hit.title,
      pageId: hit.pageid,
      snippet: stripTags(hit.snippet),
      url: articleUrl(hit.title, language),
    }));
  }
}
