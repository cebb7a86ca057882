import { createApplication } from '../core/index.js';

export async function runLinks(title: string): Promise<void> {
  const links = await createApplication().wikipedia.getLinks(title);
  for (const link of links) {
    console.log(link);
  }
}

export async function runBacklinks(title: string): Promise<void> {
  const backlinks = await createApplication().wikipedia.getBacklinks(title);
  for (const backlink of backlinks) {
    console.log(backlink);
  }
}
