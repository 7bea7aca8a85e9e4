import { registerAs } from '@nestjs/config';

export const loadScraperConfig = () => ({
  /** Puerto del servidor HTTP */
  port: parseInt(process.env.SCRAPER_PORT || '3457', 10),

  /** Búsqueda de la web oficial (DuckDuckGo HTML) */
  search: {
    region: process.env.SEARCH_REGION || 'in-en',
    maxResults: parseInt(process.env.SEARCH_MAX_RESULTS || '5', 10),
    directoryMaxResults: 3,
    maxRetries: parseInt(process.env.SEARCH_MAX_RETRIES || '2', 10),
  },

  /** Límites de concurrencia (independientes entre sí) */
  concurrency: {
    transport: parseInt(process.env.MAX_CONCURRENT_HTTP || '50', 10),
    browser: parseInt(process.env.MAX_CONCURRENT_BROWSERS || '10', 10),
    pipeline: parseInt(process.env.MAX_CONCURRENT_COMPANIES || '3', 10),
  },

  /** Empresas por sub-lote (cada sub-lote termina con un checkpoint de caches) */
  batchSize: parseInt(process.env.INTERNAL_BATCH_SIZE || '50', 10),

  /** Delays (ms) */
  delays: {
    search: {
      min: parseInt(process.env.SEARCH_DELAY_MIN || '2000', 10),
      max: parseInt(process.env.SEARCH_DELAY_MAX || '3000', 10),
    },
    retryBase: 2000,
    retryJitter: 1000,
    prefetch: { min: 1000, max: 3000 },
    subpageRetry: { min: 500, max: 1500 },
  },

  /** Timeouts por request (ms) */
  timeouts: {
    search: 15000,
    transport: 15000,
    bypass: 20000,
    browser: 30000,
  },

  /** Un HTML más corto que esto no cuenta como página válida */
  minContentLength: 500,
  maxRedirects: 5,

  /** Caches persistentes (JSON plano) */
  cache: {
    urlFile: process.env.URL_CACHE_FILE || 'url_cache.json',
    resultsFile: process.env.RESULTS_CACHE_FILE || 'results_cache.json',
  },

  /** Tier 3 (Chromium headless) */
  browserEnabled: process.env.BROWSER_TIER_ENABLED !== 'false',
  /** Chromium/Chrome ya instalado; vacío = el que gestiona playwright-core */
  browserExecutablePath: process.env.BROWSER_EXECUTABLE_PATH || '',

  /** Proxies SOCKS5 opcionales para el tier 2 (socks5h://host:port, separados por coma) */
  bypassProxies: (process.env.BYPASS_PROXIES || '')
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean),

  /** User agents para rotación */
  userAgents: [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
    'Mozilla/5.0 (X11; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0',
  ],
});

export type ScraperConfig = ReturnType<typeof loadScraperConfig>;

export const scraperConfig = registerAs('scraper', loadScraperConfig);
