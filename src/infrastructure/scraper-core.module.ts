import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { BatchOrchestratorService } from '../application/services/batch-orchestrator.service';
import { CompanyPipelineService } from '../application/services/company-pipeline.service';
import { IdentityResolverService } from '../application/services/identity-resolver.service';
import { PageSetGathererService } from '../application/services/page-set-gatherer.service';
import { TieredFetcherService } from '../application/services/tiered-fetcher.service';
import { CONTENT_EXTRACTOR_PORT } from '../domain/ports/content-extractor.port';
import { RESULTS_CACHE_STORE, URL_CACHE_STORE } from '../domain/ports/key-value-store.port';
import { PAGE_FETCHER_TIERS, PageFetcherPort } from '../domain/ports/page-fetcher.port';
import { SEARCH_PROVIDER_PORT } from '../domain/ports/search-provider.port';
import { BypassHttpAdapter } from './adapters/bypass-http.adapter';
import { CheerioContactExtractor } from './adapters/cheerio-contact-extractor.adapter';
import { DdgHttpAdapter } from './adapters/ddg-http.adapter';
import { HttpTransportAdapter } from './adapters/http-transport.adapter';
import { PlaywrightBrowserAdapter } from './adapters/playwright-browser.adapter';
import { JsonFileStore } from './persistence/json-file.store';
import { resolutionRecordCodec, resultRecordCodec } from './persistence/record.codecs';

/**
 * Núcleo del scraper: adaptadores + servicios de aplicación.
 * Lo usan tanto la API HTTP como el CLI.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    // Buscador web (implementa SearchProviderPort): DuckDuckGo HTML
    {
      provide: SEARCH_PROVIDER_PORT,
      useClass: DdgHttpAdapter,
    },
    // Tiers de descarga (implementan PageFetcherPort), en orden de escalamiento
    HttpTransportAdapter,
    BypassHttpAdapter,
    PlaywrightBrowserAdapter,
    {
      provide: PAGE_FETCHER_TIERS,
      useFactory: (
        config: ConfigService,
        transport: HttpTransportAdapter,
        bypass: BypassHttpAdapter,
        browser: PlaywrightBrowserAdapter,
      ): PageFetcherPort[] => {
        const tiers: PageFetcherPort[] = [transport, bypass];
        if (config.get<boolean>('scraper.browserEnabled', true)) tiers.push(browser);
        return tiers;
      },
      inject: [ConfigService, HttpTransportAdapter, BypassHttpAdapter, PlaywrightBrowserAdapter],
    },
    // Extractor de contactos (implementa ContentExtractorPort): Cheerio
    {
      provide: CONTENT_EXTRACTOR_PORT,
      useClass: CheerioContactExtractor,
    },
    // Caches persistentes (JSON plano)
    {
      provide: URL_CACHE_STORE,
      useFactory: (config: ConfigService) =>
        new JsonFileStore(config.get<string>('scraper.cache.urlFile', 'url_cache.json'), resolutionRecordCodec),
      inject: [ConfigService],
    },
    {
      provide: RESULTS_CACHE_STORE,
      useFactory: (config: ConfigService) =>
        new JsonFileStore(config.get<string>('scraper.cache.resultsFile', 'results_cache.json'), resultRecordCodec),
      inject: [ConfigService],
    },
    // Servicios de aplicación
    IdentityResolverService,
    TieredFetcherService,
    PageSetGathererService,
    CompanyPipelineService,
    BatchOrchestratorService,
  ],
  exports: [BatchOrchestratorService, TieredFetcherService],
})
export class ScraperCoreModule {}
