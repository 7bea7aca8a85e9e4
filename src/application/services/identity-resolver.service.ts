import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Resolution, ResolutionRecord } from '../../domain/entities/resolution.entity';
import { UrlCacheStore } from '../../domain/ports/key-value-store.port';
import {
  SEARCH_PROVIDER_PORT,
  SearchHit,
  SearchProviderPort,
} from '../../domain/ports/search-provider.port';
import { cacheKeyFor, toDirectDomainUrl } from '../../shared/utils/company-name-cleaner';
import { RateGate } from '../../shared/utils/rate-gate';
import { errorMessage } from '../../shared/utils/error-message';
import { sleep } from '../../shared/utils/timing';
import { isDirectoryUrl, rankCandidates } from '../../shared/utils/url-scorer';

/**
 * Resuelve el nombre de una empresa a su web oficial.
 *
 * 1. Cache de URLs (incluye resultados negativos) → cero red
 * 2. Nombres que ya son un dominio ("sulekha.com") → https directo
 * 3. Búsqueda web "<nombre> India official website", con reintentos
 * 4. Ranking de candidatos con scoreUrl; el primer JustDial/IndiaMART
 *    visto se guarda como URL de directorio para el fallback
 *
 * Todas las búsquedas pasan por el mismo RateGate: el buscador tiene un
 * límite implícito y las empresas se procesan en paralelo.
 */
@Injectable()
export class IdentityResolverService {
  private readonly logger = new Logger(IdentityResolverService.name);
  private readonly searchGate: RateGate;
  private readonly region: string;
  private readonly maxResults: number;
  private readonly directoryMaxResults: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly retryJitterMs: number;

  constructor(
    private readonly config: ConfigService,
    @Inject(SEARCH_PROVIDER_PORT) private readonly searchProvider: SearchProviderPort,
  ) {
    this.region = this.config.get<string>('scraper.search.region', 'in-en');
    this.maxResults = this.config.get<number>('scraper.search.maxResults', 5);
    this.directoryMaxResults = this.config.get<number>('scraper.search.directoryMaxResults', 3);
    this.maxRetries = this.config.get<number>('scraper.search.maxRetries', 2);
    this.retryBaseMs = this.config.get<number>('scraper.delays.retryBase', 2000);
    this.retryJitterMs = this.config.get<number>('scraper.delays.retryJitter', 1000);
    this.searchGate = new RateGate({
      minIntervalMs: this.config.get<number>('scraper.delays.search.min', 2000),
      maxIntervalMs: this.config.get<number>('scraper.delays.search.max', 3000),
    });
  }

  async resolve(name: string, urlCache: UrlCacheStore): Promise<Resolution> {
    const cacheKey = cacheKeyFor(name);

    const cached = urlCache.get(cacheKey);
    if (cached) {
      return { url: cached.url, directoryUrl: cached.directoryUrl, cached: true };
    }

    const directUrl = toDirectDomainUrl(name);
    if (directUrl) {
      const record: ResolutionRecord = { url: directUrl, directoryUrl: null };
      urlCache.set(cacheKey, record);
      return { ...record, cached: false };
    }

    const hits = await this.searchWithRetry(`${name} India official website`, this.maxResults);

    let directoryUrl: string | null = null;
    const candidates: string[] = [];
    for (const hit of hits) {
      if (!hit.url) continue;
      if (!directoryUrl && isDirectoryUrl(hit.url)) directoryUrl = hit.url;
      candidates.push(hit.url);
    }

    const ranked = rankCandidates(candidates, name);
    const record: ResolutionRecord = { url: ranked[0]?.url ?? null, directoryUrl };

    if (record.url) {
      this.logger.debug(`🔎 "${name}" → ${record.url} (score: ${ranked[0].score})`);
    } else {
      this.logger.debug(`🔎 "${name}" → sin web oficial${directoryUrl ? `, directorio: ${directoryUrl}` : ''}`);
    }

    urlCache.set(cacheKey, record);
    return { ...record, cached: false };
  }

  /**
   * Búsqueda dedicada en JustDial / IndiaMART.
   * Devuelve el primer hit de directorio, o null (también ante errores).
   */
  async findDirectoryUrl(name: string): Promise<string | null> {
    const query = `"${name}" site:justdial.com OR site:indiamart.com`;
    try {
      const hits = await this.searchGate.schedule(() =>
        this.searchProvider.search(query, this.directoryMaxResults, this.region),
      );
      return hits.find((hit) => isDirectoryUrl(hit.url))?.url ?? null;
    } catch (error) {
      this.logger.debug(`Búsqueda de directorio falló para "${name}": ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * maxRetries + 1 intentos con backoff exponencial.
   * Agotados los intentos se sigue sin resultados: el error no sale de aquí.
   */
  private async searchWithRetry(query: string, maxResults: number): Promise<SearchHit[]> {
    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.searchGate.schedule(() =>
          this.searchProvider.search(query, maxResults, this.region),
        );
      } catch (error) {
        const message = errorMessage(error);
        if (attempt < this.maxRetries) {
          const wait = this.retryBaseMs * 2 ** attempt + Math.random() * this.retryJitterMs;
          this.logger.warn(
            `⚠️ Búsqueda falló (${message}), reintento ${attempt + 1}/${this.maxRetries} en ${Math.round(wait)}ms`,
          );
          await sleep(wait);
        } else {
          this.logger.error(`❌ Búsqueda falló tras ${this.maxRetries + 1} intentos: ${message}`);
        }
      }
    }
    return [];
  }
}
