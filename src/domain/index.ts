export { ResultStatus, ResultSource, SkipReason, FailureReason } from './enums/result-status.enum';
export { FetchTier } from './enums/fetch-tier.enum';
export type { FetchFailureReason } from './enums/fetch-tier.enum';
export type { CompanyEntry } from './entities/company-entry.entity';
export type { Resolution, ResolutionRecord } from './entities/resolution.entity';
export { PageCache, emptyPageSet, hasAnyPage } from './entities/page-set.entity';
export type { PageSet } from './entities/page-set.entity';
export { hasContactChannels } from './entities/contact-info.entity';
export type { ContactInfo } from './entities/contact-info.entity';
export { CompanyResult } from './entities/company-result.entity';
export { TierStatus } from './entities/tier-status.entity';
export type { TierSnapshot } from './entities/tier-status.entity';
export { fetchFailure } from './entities/fetch-outcome.entity';
export type { FetchOutcome, FetchAttempt, DetailedFetch } from './entities/fetch-outcome.entity';
export type { BatchReport, BatchSummary, BatchRange, SkippedEntry } from './entities/batch-report.entity';
export { SEARCH_PROVIDER_PORT } from './ports/search-provider.port';
export type { SearchProviderPort, SearchHit } from './ports/search-provider.port';
export { PAGE_FETCHER_TIERS } from './ports/page-fetcher.port';
export type { PageFetcherPort } from './ports/page-fetcher.port';
export { CONTENT_EXTRACTOR_PORT } from './ports/content-extractor.port';
export type { ContentExtractorPort } from './ports/content-extractor.port';
export { URL_CACHE_STORE, RESULTS_CACHE_STORE } from './ports/key-value-store.port';
export type { KeyValueStore, UrlCacheStore, ResultsCacheStore } from './ports/key-value-store.port';
