/** Las (hasta) tres páginas que se analizan por empresa */
export interface PageSet {
  homepage: string | null;
  aboutPage: string | null;
  contactPage: string | null;
}

export function emptyPageSet(): PageSet {
  return { homepage: null, aboutPage: null, contactPage: null };
}

export function hasAnyPage(pages: PageSet): boolean {
  return Boolean(pages.homepage || pages.aboutPage || pages.contactPage);
}

/**
 * HTML descargado durante una corrida, por URL exacta.
 * Vive en memoria: no se persiste entre corridas.
 */
export class PageCache {
  private readonly pages = new Map<string, string>();

  get(url: string): string | undefined {
    return this.pages.get(url);
  }

  set(url: string, html: string): void {
    this.pages.set(url, html);
  }

  get size(): number {
    return this.pages.size;
  }
}
