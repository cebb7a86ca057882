/**
 * Database schema definitions using Drizzle ORM
 */
import { index, integer, pgTable, primaryKey, serial, text, varchar } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { MAX_TITLE_LENGTH } from '../../wiki/titles.js';

/**
 * Cached Wikipedia pages
 * One row per visited article, with the outgoing links and backlinks seen at fetch time
 */
export const wikiPages = pgTable(
  'wikipage',
  {
    id: serial('id').primaryKey(),
    title: varchar('title', { length: MAX_TITLE_LENGTH }).notNull().unique(),
    links: text('links').array().notNull().default(sql`'{}'::text[]`),
    backlinks: text('backlinks').array().notNull().default(sql`'{}'::text[]`),
  },
  (table) => [index('ix_wikipage_title').on(table.title)]
);

/**
 * Level-two children: pages reached through a cached page
 * when the search goes deeper than one intermediate page
 */
export const descendances = pgTable(
  'descendances',
  {
    parentPageId: integer('parent_page_id')
      .notNull()
      .references(() => wikiPages.id, { onDelete: 'cascade' }),
    childPageId: integer('child_page_id')
      .notNull()
      .references(() => wikiPages.id, { onDelete: 'cascade' }),
  },
  (table) => [primaryKey({ columns: [table.parentPageId, table.childPageId] })]
);

export type WikiPageRow = typeof wikiPages.$inferSelect;
export type NewWikiPageRow = typeof wikiPages.$inferInsert;
