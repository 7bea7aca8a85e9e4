import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as https from 'https';
import * as cheerio from 'cheerio';
import { SearchHit, SearchProviderPort } from '../../domain/ports/search-provider.port';

/** Marcas de la página "are you a bot?" de DuckDuckGo */
const ANOMALY_MARKERS = ['anomaly-modal', 'Unfortunately, bots use DuckDuckGo too'];

/**
 * Parsea la versión HTML (sin JS) de resultados de DuckDuckGo.
 * Los anuncios se descartan; los links de redirect (?uddg=) se decodifican.
 */
export function parseDuckDuckGoResults(html: string): SearchHit[] {
  const $ = cheerio.load(html);
  const hits: SearchHit[] = [];

  $('.result').each((_, el) => {
    const block = $(el);
    if (block.hasClass('result--ad')) return;

    const link = block.find('a.result__a').first();
    const url = decodeResultUrl(link.attr('href') ?? '');
    if (!url) return;

    hits.push({
      url,
      title: link.text().replace(/\s+/g, ' ').trim(),
      snippet: block.find('.result__snippet').first().text().replace(/\s+/g, ' ').trim(),
    });
  });

  return hits;
}

function decodeResultUrl(href: string): string | null {
  if (!href) return null;

  let url = href;
  // DDG usa redirect URLs con ?uddg=
  if (href.includes('uddg=')) {
    try {
      url = new URL(href, 'https://duckduckgo.com').searchParams.get('uddg') ?? href;
    } catch {
      return null;
    }
  }

  return /^https?:\/\//i.test(url) ? url : null;
}

/**
 * Adaptador DDG HTTP.
 *
 * Hace POST directo a html.duckduckgo.com/html/ (la versión sin JS).
 * No necesita navegador. ~1-2s por búsqueda.
 * Lanza ante respuestas no-200 o la página anti-bots para que el
 * resolver reintente con backoff.
 */
@Injectable()
export class DdgHttpAdapter implements SearchProviderPort {
  private readonly logger = new Logger(DdgHttpAdapter.name);
  private readonly userAgents: string[];
  private readonly timeoutMs: number;

  constructor(private readonly config: ConfigService) {
    this.userAgents = this.config.get<string[]>('scraper.userAgents', [
      'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 Chrome/124.0.0.0 Safari/537.36',
    ]);
    this.timeoutMs = this.config.get<number>('scraper.timeouts.search', 15000);
  }

  async search(query: string, maxResults: number, region: string): Promise<SearchHit[]> {
    const startTime = Date.now();
    const { status, body } = await this.postQuery(query, region);

    if (status !== 200) {
      throw new Error(`DDG HTTP ${status}`);
    }
    if (ANOMALY_MARKERS.some((marker) => body.includes(marker))) {
      throw new Error('DDG devolvió la página anti-bots');
    }

    const hits = parseDuckDuckGoResults(body).slice(0, maxResults);
    this.logger.debug(`[DDG HTTP] "${query}" → ${hits.length} resultados (${Date.now() - startTime}ms)`);
    return hits;
  }

  private postQuery(query: string, region: string): Promise<{ status: number; body: string }> {
    return new Promise((resolve, reject) => {
      const postData = new URLSearchParams({ q: query, kl: region }).toString();
      const ua = this.userAgents[Math.floor(Math.random() * this.userAgents.length)];

      const options: https.RequestOptions = {
        hostname: 'html.duckduckgo.com',
        path: '/html/',
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Content-Length': Buffer.byteLength(postData),
          'User-Agent': ua,
          Accept: 'text/html,application/xhtml+xml',
          'Accept-Language': 'en-IN,en;q=0.9',
          Referer: 'https://duckduckgo.com/',
        },
      };

      const req = https.request(options, (res) => {
        let data = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => (data += chunk));
        res.on('end', () => resolve({ status: res.statusCode ?? 0, body: data }));
        res.on('error', reject);
      });

      req.on('error', reject);
      req.setTimeout(this.timeoutMs, () => {
        req.destroy(new Error('Timeout DDG HTTP'));
      });

      req.write(postData);
      req.end();
    });
  }
}
