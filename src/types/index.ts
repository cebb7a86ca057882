/**
 * Shared domain types
 */

export interface WikiPage {
  id: number;
  title: string;
  links: string[];
  backlinks: string[];
}

export type NewWikiPage = Omit<WikiPage, 'id'>;

/**
 * Source of page links; implemented by the MediaWiki client
 */
export interface LinkSource {
  getLinks(title: string): Promise<string[]>;
  getBacklinks(title: string): Promise<string[]>;
}

export interface PortMapping {
  /** null when the container port is not published to a fixed host port */
  hostPort: number | null;
  containerPort: number;
}
