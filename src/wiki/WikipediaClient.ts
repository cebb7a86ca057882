/**
 * MediaWiki action API client
 * Fetches outgoing links and backlinks of an article
 */
import { z } from 'zod';
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { WikiApiError, errorMessage } from '../core/errors.js';
import type { LinkSource } from '../types/index.js';
import { RequestThrottle } from './RequestThrottle.js';
import { filterTitles } from './titles.js';

export interface WikipediaClientOptions {
  apiUrl: string;
  linksPerPage: number;
  requestsPerMinute: number;
  timeoutMs: number;
  userAgent: string;
}

const apiErrorSchema = z.object({
  error: z.object({
    code: z.string(),
    info: z.string().default(''),
  }),
});

const linksResponseSchema = z.object({
  query: z.object({
    pages: z.record(
      z.object({
        title: z.string().optional(),
        missing: z.string().optional(),
        links: z.array(z.object({ title: z.string() })).optional(),
      })
    ),
  }),
});

const backlinksResponseSchema = z.object({
  query: z.object({
    backlinks: z.array(z.object({ title: z.string() })),
  }),
});

type QueryParams = Record<string, string | number>;

export class WikipediaClient implements LinkSource {
  private readonly logger: Logger;
  private readonly throttle: RequestThrottle;

  constructor(private readonly options: WikipediaClientOptions) {
    this.logger = createChildLogger({ service: 'Wikipedia' });
    this.throttle = new RequestThrottle({ maxRequests: options.requestsPerMinute });
  }

  /**
   * Titles linked from a page, technical titles removed.
   * Returns [] for missing pages and pages without links.
   */
  async getLinks(title: string): Promise<string[]> {
    const body = await this.request({
      action: 'query',
      format: 'json',
      prop: 'links',
      pllimit: this.options.linksPerPage,
      titles: title,
    });

    const parsed = linksResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw WikiApiError.invalidResponse(parsed.error.issues[0]?.message ?? 'links query');
    }

    const [page] = Object.values(parsed.data.query.pages);
    if (!page?.links) {
      this.logger.debug({ title, missing: page?.missing !== undefined }, 'Page has no links');
      return [];
    }

    const links = filterTitles(page.links.map((link) => link.title));
    this.logger.debug({ title, count: links.length }, 'Fetched links');
    return links;
  }

  /**
   * Titles of pages linking to the given page
   */
  async getBacklinks(title: string): Promise<string[]> {
    const body = await this.request({
      action: 'query',
      format: 'json',
      list: 'backlinks',
      bltitle: title,
      bllimit: this.options.linksPerPage,
    });

    const parsed = backlinksResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw WikiApiError.invalidResponse(parsed.error.issues[0]?.message ?? 'backlinks query');
    }

    const backlinks = parsed.data.query.backlinks.map((entry) => entry.title);
    this.logger.debug({ title, count: backlinks.length }, 'Fetched backlinks');
    return backlinks;
  }

  private async request(params: QueryParams): Promise<unknown> {
    await this.throttle.acquire();

    const url = new URL(this.options.apiUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    let response: Response;
    try {
      response = await fetch(url.toString(), {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      this.logger.error({ error, params }, 'MediaWiki API request failed');
      throw new WikiApiError(`MediaWiki API request failed: ${errorMessage(error)}`, undefined, 'NETWORK_ERROR');
    }

    if (!response.ok) {
      this.logger.debug({ status: response.status, params }, 'MediaWiki API error status');
      throw WikiApiError.http(response.status, response.statusText);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw WikiApiError.invalidResponse(`body is not JSON (${errorMessage(error)})`);
    }

    const apiError = apiErrorSchema.safeParse(body);
    if (apiError.success) {
      throw WikiApiError.api(apiError.data.error.code, apiError.data.error.info);
    }

    return body;
  }
}
