import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pLimit from 'p-limit';
import {
  DetailedFetch,
  FetchAttempt,
  FetchOutcome,
  fetchFailure,
} from '../../domain/entities/fetch-outcome.entity';
import { TierStatus } from '../../domain/entities/tier-status.entity';
import { FetchTier } from '../../domain/enums/fetch-tier.enum';
import { PAGE_FETCHER_TIERS, PageFetcherPort } from '../../domain/ports/page-fetcher.port';
import { errorMessage } from '../../shared/utils/error-message';

type Limit = ReturnType<typeof pLimit>;

/**
 * Descarga una URL recorriendo los tiers en orden (transport → bypass → browser).
 *
 * - Corta en el primer tier que entrega más de `minContentLength` caracteres.
 * - transport y browser tienen su propio límite de concurrencia; bypass no.
 * - Un tier que lanza cuenta como network_error: nada sale de aquí.
 * - Un tier que responde `unavailable` queda apagado el resto del proceso.
 */
@Injectable()
export class TieredFetcherService {
  private readonly logger = new Logger(TieredFetcherService.name);
  private readonly limiters = new Map<FetchTier, Limit>();
  private readonly statuses = new Map<FetchTier, TierStatus>();
  private readonly minContentLength: number;

  constructor(
    private readonly config: ConfigService,
    @Inject(PAGE_FETCHER_TIERS) private readonly tiers: PageFetcherPort[],
  ) {
    this.minContentLength = this.config.get<number>('scraper.minContentLength', 500);
    this.limiters.set(
      FetchTier.TRANSPORT,
      pLimit(this.config.get<number>('scraper.concurrency.transport', 50)),
    );
    this.limiters.set(
      FetchTier.BROWSER,
      pLimit(this.config.get<number>('scraper.concurrency.browser', 10)),
    );

    for (const fetcher of this.tiers) {
      this.statuses.set(fetcher.tier, new TierStatus(fetcher.tier));
    }
    this.logger.log(`Tiers activos: ${this.tiers.map((t) => t.tier).join(' → ') || '(ninguno)'}`);
  }

  /** HTML de la URL, o null si ningún tier lo consiguió */
  async fetchPage(url: string): Promise<string | null> {
    const result = await this.fetchPageDetailed(url);
    return result.html;
  }

  async fetchPageDetailed(url: string): Promise<DetailedFetch> {
    const attempts: FetchAttempt[] = [];

    for (const fetcher of this.tiers) {
      const status = this.statuses.get(fetcher.tier);
      if (status && !status.available) continue;

      const startTime = Date.now();
      const outcome = await this.runTier(fetcher, url);
      const elapsedMs = Date.now() - startTime;
      attempts.push({ tier: fetcher.tier, outcome, elapsedMs });

      if (outcome.ok) {
        status?.recordUse(true, elapsedMs);
        if (fetcher.tier !== FetchTier.TRANSPORT) {
          this.logger.debug(`   ✓ ${url} vía ${fetcher.tier} (${elapsedMs}ms)`);
        }
        return { url, html: outcome.html, tier: fetcher.tier, attempts };
      }

      status?.recordUse(false, elapsedMs, outcome.reason);
      this.logger.debug(
        `   ↪ ${fetcher.tier} falló para ${url}: ${outcome.reason}` +
          (outcome.status ? ` (HTTP ${outcome.status})` : '') +
          (outcome.detail ? ` — ${outcome.detail}` : ''),
      );

      if (outcome.reason === 'unavailable' && status?.available) {
        status.markUnavailable();
        this.logger.warn(`⚠️ Tier ${fetcher.tier} no disponible; se desactiva para el resto del proceso`);
      }
    }

    return { url, html: null, tier: null, attempts };
  }

  getStatuses(): TierStatus[] {
    return this.tiers
      .map((t) => this.statuses.get(t.tier))
      .filter((s): s is TierStatus => s !== undefined);
  }

  private async runTier(fetcher: PageFetcherPort, url: string): Promise<FetchOutcome> {
    const limiter = this.limiters.get(fetcher.tier);
    let outcome: FetchOutcome;
    try {
      outcome = limiter
        ? await limiter(() => fetcher.fetch(url))
        : await fetcher.fetch(url);
    } catch (error) {
      return fetchFailure('network_error', errorMessage(error));
    }

    if (outcome.ok && outcome.html.length <= this.minContentLength) {
      return fetchFailure('too_short', `${outcome.html.length} caracteres`, outcome.status);
    }
    return outcome;
  }
}
