import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PageCache, PageSet, emptyPageSet } from '../../domain/entities/page-set.entity';
import { HostRateGates } from '../../shared/utils/rate-gate';
import {
  ABOUT_PATHS,
  CONTACT_PATHS,
  discoverSubpages,
  resolveLink,
} from '../../shared/utils/subpage-discovery';
import { randomBetween, sleep } from '../../shared/utils/timing';
import { TieredFetcherService } from './tiered-fetcher.service';

type DelayRange = { min: number; max: number };

/** Candidatos probados como máximo por página (about / contacto) */
const MAX_ATTEMPTS_PER_PAGE = 3;

/**
 * Junta home + about + contacto de un sitio.
 *
 * 1. Throttle por host antes de empezar
 * 2. Home (cache de páginas → fetcher). Sin home no se pide nada más
 * 3. Links about/contacto descubiertos en el home, luego rutas típicas
 * 4. Hasta 3 intentos por página; gana el primero con contenido suficiente
 */
@Injectable()
export class PageSetGathererService {
  private readonly logger = new Logger(PageSetGathererService.name);
  private readonly hostGates: HostRateGates;
  private readonly minContentLength: number;
  private readonly retryDelay: DelayRange;

  constructor(
    private readonly config: ConfigService,
    private readonly fetcher: TieredFetcherService,
  ) {
    this.minContentLength = this.config.get<number>('scraper.minContentLength', 500);
    this.retryDelay = this.config.get<DelayRange>('scraper.delays.subpageRetry', { min: 500, max: 1500 });
    const prefetch = this.config.get<DelayRange>('scraper.delays.prefetch', { min: 1000, max: 3000 });
    this.hostGates = new HostRateGates({
      minIntervalMs: prefetch.min,
      maxIntervalMs: prefetch.max,
    });
  }

  async gather(baseUrl: string, pageCache: PageCache): Promise<PageSet> {
    const pages = emptyPageSet();

    await this.hostGates.forUrl(baseUrl).acquire();

    pages.homepage = await this.homepage(baseUrl, pageCache);
    if (!pages.homepage) {
      this.logger.debug(`   ✗ Sin home para ${baseUrl}`);
      return pages;
    }

    const discovered = discoverSubpages(pages.homepage, baseUrl);
    const seen = new Set<string>([baseUrl]);
    const normalizedBase = resolveLink(baseUrl, baseUrl);
    if (normalizedBase) seen.add(normalizedBase);

    pages.aboutPage = await this.firstValidPage(
      this.candidates(discovered.aboutUrl, ABOUT_PATHS, baseUrl),
      seen,
      pageCache,
    );
    pages.contactPage = await this.firstValidPage(
      this.candidates(discovered.contactUrl, CONTACT_PATHS, baseUrl),
      seen,
      pageCache,
    );

    this.logger.debug(
      `   📄 ${baseUrl}: home ✓, about ${pages.aboutPage ? '✓' : '✗'}, contacto ${pages.contactPage ? '✓' : '✗'}`,
    );
    return pages;
  }

  private async homepage(baseUrl: string, pageCache: PageCache): Promise<string | null> {
    const cached = pageCache.get(baseUrl);
    if (cached !== undefined) return cached;

    const html = await this.fetcher.fetchPage(baseUrl);
    if (html) pageCache.set(baseUrl, html);
    return html;
  }

  private candidates(discovered: string | null, paths: string[], baseUrl: string): string[] {
    const urls: string[] = [];
    if (discovered) urls.push(discovered);
    for (const path of paths) {
      const url = resolveLink(path, baseUrl);
      if (url) urls.push(url);
    }
    return urls;
  }

  /**
   * `seen` se comparte entre listas: una URL probada para "about"
   * no se vuelve a probar para "contacto".
   */
  private async firstValidPage(
    candidates: string[],
    seen: Set<string>,
    pageCache: PageCache,
  ): Promise<string | null> {
    let attempts = 0;

    for (const url of candidates) {
      if (seen.has(url)) continue;
      if (attempts >= MAX_ATTEMPTS_PER_PAGE) break;
      seen.add(url);

      if (attempts > 0) {
        await sleep(randomBetween(this.retryDelay.min, this.retryDelay.max));
      }
      attempts++;

      const cached = pageCache.get(url);
      if (cached !== undefined) return cached;

      const html = await this.fetcher.fetchPage(url);
      if (html && html.length > this.minContentLength) {
        pageCache.set(url, html);
        return html;
      }
    }

    return null;
  }
}
