import { ConfigService } from '@nestjs/config';
import { ScraperConfig, loadScraperConfig } from '../../src/shared/config/scraper.config';

/**
 * Config del scraper sin delays, para que los tests no esperen.
 * `patch` modifica la copia antes de construir el ConfigService.
 */
export function testConfig(patch?: (cfg: ScraperConfig) => void): ConfigService {
  const cfg = loadScraperConfig();
  cfg.delays = {
    search: { min: 0, max: 0 },
    retryBase: 0,
    retryJitter: 0,
    prefetch: { min: 0, max: 0 },
    subpageRetry: { min: 0, max: 0 },
  };
  cfg.browserEnabled = false;
  cfg.bypassProxies = [];
  patch?.(cfg);
  return new ConfigService({ scraper: cfg });
}
