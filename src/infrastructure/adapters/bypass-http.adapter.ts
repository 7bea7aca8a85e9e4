import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { constants } from 'crypto';
import * as http from 'http';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { FetchOutcome, fetchFailure } from '../../domain/entities/fetch-outcome.entity';
import { FetchTier } from '../../domain/enums/fetch-tier.enum';
import { PageFetcherPort } from '../../domain/ports/page-fetcher.port';
import { HttpGetOptions, httpGet } from '../../shared/utils/http-get';
import { BLOCKED_STATUSES } from './http-transport.adapter';

/**
 * Chrome-like TLS cipher suite para bypass Cloudflare JA3 fingerprinting
 */
const CHROME_CIPHERS = [
  'TLS_AES_128_GCM_SHA256',
  'TLS_AES_256_GCM_SHA384',
  'TLS_CHACHA20_POLY1305_SHA256',
  'ECDHE-ECDSA-AES128-GCM-SHA256',
  'ECDHE-RSA-AES128-GCM-SHA256',
  'ECDHE-ECDSA-AES256-GCM-SHA384',
  'ECDHE-RSA-AES256-GCM-SHA384',
  'ECDHE-ECDSA-CHACHA20-POLY1305',
  'ECDHE-RSA-CHACHA20-POLY1305',
  'ECDHE-RSA-AES128-SHA',
  'ECDHE-RSA-AES256-SHA',
  'AES128-GCM-SHA256',
  'AES256-GCM-SHA384',
].join(':');

const CHROME_TLS: HttpGetOptions['tls'] = {
  ciphers: CHROME_CIPHERS,
  ecdhCurve: 'X25519:prime256v1:secp384r1',
  secureOptions:
    constants.SSL_OP_NO_SSLv2 | constants.SSL_OP_NO_SSLv3 | constants.SSL_OP_NO_COMPRESSION,
  minVersion: 'TLSv1.2',
};

/** Páginas de desafío que responden 200 pero no son el sitio */
export const CHALLENGE_MARKERS = [
  'Just a moment',
  'cf-browser-verification',
  'cf_chl_opt',
  'Attention Required',
];

/**
 * Headers de navegador coherentes con el user agent elegido.
 * Los Sec-Ch-Ua sólo los manda Chromium.
 */
export function browserHeaders(userAgent: string): http.OutgoingHttpHeaders {
  const headers: http.OutgoingHttpHeaders = {
    'User-Agent': userAgent,
    Accept:
      'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    'Accept-Language': 'en-IN,en-GB;q=0.9,en-US;q=0.8,en;q=0.7',
    'Accept-Encoding': 'gzip, deflate, br',
    'Cache-Control': 'no-cache',
    Pragma: 'no-cache',
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Site': 'none',
    'Sec-Fetch-User': '?1',
    'Upgrade-Insecure-Requests': '1',
    Connection: 'keep-alive',
  };

  const chrome = /Chrome\/(\d+)/.exec(userAgent);
  if (chrome && !userAgent.includes('Firefox')) {
    const brand = userAgent.includes('Edg/') ? 'Microsoft Edge' : 'Google Chrome';
    headers['Sec-Ch-Ua'] = `"Not_A Brand";v="8", "Chromium";v="${chrome[1]}", "${brand}";v="${chrome[1]}"`;
    headers['Sec-Ch-Ua-Mobile'] = '?0';
    headers['Sec-Ch-Ua-Platform'] = userAgent.includes('Windows')
      ? '"Windows"'
      : userAgent.includes('Mac OS')
        ? '"macOS"'
        : '"Linux"';
  }

  return headers;
}

/**
 * Tier 2: GET con huella de navegador.
 *
 * - Orden de ciphers y curvas de Chrome (JA3 parecido al de un navegador)
 * - User agent aleatorio por request, con sus headers Sec-* coherentes
 * - Proxies SOCKS5 opcionales (BYPASS_PROXIES), en rotación
 * - Las páginas de desafío de Cloudflare cuentan como "blocked"
 *
 * No pasa por el limitador de transporte.
 */
@Injectable()
export class BypassHttpAdapter implements PageFetcherPort {
  readonly tier = FetchTier.BYPASS;
  private readonly logger = new Logger(BypassHttpAdapter.name);
  private readonly userAgents: string[];
  private readonly proxies: string[];
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private proxyIndex = 0;

  constructor(private readonly config: ConfigService) {
    this.userAgents = this.config.get<string[]>('scraper.userAgents', []);
    this.proxies = this.config.get<string[]>('scraper.bypassProxies', []);
    this.timeoutMs = this.config.get<number>('scraper.timeouts.bypass', 20000);
    this.maxRedirects = this.config.get<number>('scraper.maxRedirects', 5);

    if (this.proxies.length > 0) {
      this.logger.log(`🧦 Bypass con ${this.proxies.length} proxies SOCKS5`);
    }
  }

  async fetch(url: string): Promise<FetchOutcome> {
    const proxyUrl = this.nextProxy();
    const result = await httpGet(url, {
      timeoutMs: this.timeoutMs,
      maxRedirects: this.maxRedirects,
      headers: browserHeaders(this.randomUserAgent()),
      tls: CHROME_TLS,
      ...(proxyUrl ? { agent: new SocksProxyAgent(proxyUrl) } : {}),
    });

    if (result.kind === 'error') {
      const detail = proxyUrl ? `${result.message} (vía ${proxyUrl})` : result.message;
      return fetchFailure(result.error === 'timeout' ? 'timeout' : 'network_error', detail);
    }
    if (BLOCKED_STATUSES.has(result.status)) {
      return fetchFailure('blocked', undefined, result.status);
    }
    if (result.status !== 200) {
      return fetchFailure('http_error', undefined, result.status);
    }

    const marker = CHALLENGE_MARKERS.find((m) => result.body.includes(m));
    if (marker) {
      return fetchFailure('blocked', `página de desafío ("${marker}")`, result.status);
    }

    return { ok: true, html: result.body, status: result.status };
  }

  private randomUserAgent(): string {
    if (this.userAgents.length === 0) {
      return 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';
    }
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  }

  /** Round-robin; null si no hay proxies configurados */
  private nextProxy(): string | null {
    if (this.proxies.length === 0) return null;
    const proxy = this.proxies[this.proxyIndex % this.proxies.length];
    this.proxyIndex++;
    return proxy;
  }
}
