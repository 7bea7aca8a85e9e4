import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FetchOutcome, fetchFailure } from '../../domain/entities/fetch-outcome.entity';
import { FetchTier } from '../../domain/enums/fetch-tier.enum';
import { PageFetcherPort } from '../../domain/ports/page-fetcher.port';
import { httpGet } from '../../shared/utils/http-get';

/** Respuestas de WAF / anti-bot: no es un fallo, hay que escalar */
export const BLOCKED_STATUSES = new Set([403, 429, 503]);

/**
 * Tier 1: GET HTTP simple con redirects.
 * El fetcher lo limita a `concurrency.transport` requests simultáneos.
 */
@Injectable()
export class HttpTransportAdapter implements PageFetcherPort {
  readonly tier = FetchTier.TRANSPORT;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;

  constructor(private readonly config: ConfigService) {
    const userAgents = this.config.get<string[]>('scraper.userAgents', []);
    this.userAgent =
      userAgents[0] ??
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';
    this.timeoutMs = this.config.get<number>('scraper.timeouts.transport', 15000);
    this.maxRedirects = this.config.get<number>('scraper.maxRedirects', 5);
  }

  async fetch(url: string): Promise<FetchOutcome> {
    const result = await httpGet(url, {
      timeoutMs: this.timeoutMs,
      maxRedirects: this.maxRedirects,
      headers: {
        'User-Agent': this.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-IN,en;q=0.9',
        'Accept-Encoding': 'gzip, deflate',
        Connection: 'keep-alive',
      },
    });

    if (result.kind === 'error') {
      return fetchFailure(result.error === 'timeout' ? 'timeout' : 'network_error', result.message);
    }
    if (BLOCKED_STATUSES.has(result.status)) {
      return fetchFailure('blocked', undefined, result.status);
    }
    if (result.status !== 200) {
      return fetchFailure('http_error', undefined, result.status);
    }
    return { ok: true, html: result.body, status: result.status };
  }
}
