/**
 * WikiRacer
 * Finds a chain of links leading from one article to another,
 * caching every visited page
 */
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import { eventBus as defaultEventBus, EventTypes, type EventBus } from '../core/EventBus.js';
import { InvalidPageError } from '../core/errors.js';
import type { PageRepository } from '../repositories/PageRepository.js';
import type { LinkSource, WikiPage } from '../types/index.js';
import { isValidTitle } from '../wiki/titles.js';

export interface WikiRacerOptions {
  /** Maximum number of intermediate pages between start and finish */
  searchDepth: number;
  fetchBacklinks: boolean;
}

interface SearchNode {
  title: string;
  links: string[];
  path: string[];
}

interface SearchResult {
  path: string[];
  pagesVisited: number;
}

export class WikiRacer {
  private readonly logger: Logger;

  constructor(
    private readonly source: LinkSource,
    private readonly pages: PageRepository,
    private readonly options: WikiRacerOptions,
    private readonly events: EventBus = defaultEventBus
  ) {
    this.logger = createChildLogger({ service: 'WikiRacer' });
  }

  /**
   * Check that a title can take part in a race and return its links.
   * Technical titles and pages without links are rejected.
   */
  async validatePage(title: string): Promise<string[]> {
    if (!isValidTitle(title)) {
      throw new InvalidPageError(title);
    }

    const links = await this.source.getLinks(title);
    if (links.length === 0) {
      throw new InvalidPageError(title);
    }
    return links;
  }

  /**
   * Find a path of article titles from `start` to `finish`.
   * Returns [] when no path exists within the configured depth;
   * throws InvalidPageError when either endpoint cannot be raced.
   */
  async findPath(start: string, finish: string): Promise<string[]> {
    const startedAt = Date.now();
    this.events.publish(EventTypes.RACE_STARTED, { start, finish, depth: this.options.searchDepth });

    const startLinks = await this.validatePage(start);
    await this.validatePage(finish);

    let result: SearchResult;
    if (start === finish) {
      result = { path: [start], pagesVisited: 0 };
    } else if (startLinks.includes(finish)) {
      result = { path: [start, finish], pagesVisited: 0 };
    } else {
      result = await this.search(start, startLinks, finish);
    }

    const durationMs = Date.now() - startedAt;
    if (result.path.length > 0) {
      this.logger.info({ path: result.path.join(' -> '), durationMs }, `${symbols.race} Path found`);
    } else {
      this.logger.info({ start, finish, count: result.pagesVisited, durationMs }, 'No path found');
    }

    this.events.publish(EventTypes.RACE_COMPLETED, {
      start,
      finish,
      path: result.path,
      pagesVisited: result.pagesVisited,
      durationMs,
    });

    return result.path;
  }

  /**
   * Breadth-first search over links, in API order, each title visited once
   */
  private async search(start: string, startLinks: string[], finish: string): Promise<SearchResult> {
    const visited = new Set<string>([start]);
    let frontier: SearchNode[] = [{ title: start, links: startLinks, path: [start] }];
    let pagesVisited = 0;

    for (let depth = 1; depth <= this.options.searchDepth && frontier.length > 0; depth++) {
      this.logger.debug({ depth, count: frontier.length }, 'Expanding search level');
      const next: SearchNode[] = [];

      for (const node of frontier) {
        for (const link of node.links) {
          if (visited.has(link)) continue;
          visited.add(link);

          const page = await this.loadPage(link);
          if (!page) continue;
          pagesVisited++;

          if (depth > 1) {
            await this.pages.addChild(node.title, link);
          }

          const path = [...node.path, link];
          if (page.links.includes(finish)) {
            return { path: [...path, finish], pagesVisited };
          }
          next.push({ title: link, links: page.links, path });
        }
      }

      frontier = next;
    }

    return { path: [], pagesVisited };
  }

  /**
   * Read a page from the cache, fetching and storing it on a miss.
   * Returns null for pages that cannot be raced through.
   */
  private async loadPage(title: string): Promise<WikiPage | null> {
    const cached = await this.pages.findByTitle(title);
    if (cached) {
      return cached;
    }

    let links: string[];
    try {
      links = await this.validatePage(title);
    } catch (error) {
      if (error instanceof InvalidPageError) {
        this.logger.debug({ title }, 'Skipping invalid page');
        this.events.publish(EventTypes.PAGE_SKIPPED, { title, reason: error.message });
        return null;
      }
      throw error;
    }

    const backlinks = this.options.fetchBacklinks ? await this.source.getBacklinks(title) : [];
    const page = await this.pages.create({ title, links, backlinks });

    this.logger.debug({ title, count: links.length }, `${symbols.page} Page cached`);
    this.events.publish(EventTypes.PAGE_CACHED, {
      title,
      linkCount: links.length,
      backlinkCount: backlinks.length,
    });
    return page;
  }
}
