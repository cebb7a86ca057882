/**
 * Page cache repository
 */
import { asc, count, eq } from 'drizzle-orm';
import { alias, type PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { descendances, wikiPages, type PageDatabase } from '../database/index.js';
import type { NewWikiPage, WikiPage } from '../types/index.js';

export interface PageRepository {
  findByTitle(title: string): Promise<WikiPage | null>;
  /** Store a page; an already cached title is returned as stored */
  create(page: NewWikiPage): Promise<WikiPage>;
  /** Record that `childTitle` was reached through `parentTitle` */
  addChild(parentTitle: string, childTitle: string): Promise<void>;
  getChildren(title: string): Promise<string[]>;
  count(): Promise<number>;
}

const childPages = alias(wikiPages, 'child_page');

export class DrizzlePageRepository<TQueryResult extends PgQueryResultHKT> implements PageRepository {
  constructor(private readonly db: PageDatabase<TQueryResult>) {}

  async findByTitle(title: string): Promise<WikiPage | null> {
    const rows = await this.db.select().from(wikiPages).where(eq(wikiPages.title, title)).limit(1);
    return rows[0] ?? null;
  }

  async create(page: NewWikiPage): Promise<WikiPage> {
    const inserted = await this.db
      .insert(wikiPages)
      .values({ title: page.title, links: page.links, backlinks: page.backlinks })
      .onConflictDoNothing({ target: wikiPages.title })
      .returning();

    const created = inserted[0] ?? (await this.findByTitle(page.title));
    if (!created) {
      throw new Error(`Failed to store page: ${page.title}`);
    }
    return created;
  }

  async addChild(parentTitle: string, childTitle: string): Promise<void> {
    const parent = await this.findByTitle(parentTitle);
    const child = await this.findByTitle(childTitle);
    if (!parent || !child) {
      return;
    }

    await this.db
      .insert(descendances)
      .values({ parentPageId: parent.id, childPageId: child.id })
      .onConflictDoNothing();
  }

  async getChildren(title: string): Promise<string[]> {
    const rows = await this.db
      .select({ title: childPages.title })
      .from(descendances)
      .innerJoin(wikiPages, eq(descendances.parentPageId, wikiPages.id))
      .innerJoin(childPages, eq(descendances.childPageId, childPages.id))
      .where(eq(wikiPages.title, title))
      .orderBy(asc(childPages.title));

    return rows.map((row) => row.title);
  }

  async count(): Promise<number> {
    const rows = await this.db.select({ value: count() }).from(wikiPages);
    return rows[0]?.value ?? 0;
  }
}
