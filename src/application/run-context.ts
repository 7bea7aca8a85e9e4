import { PageCache } from '../domain/entities/page-set.entity';
import { ResultsCacheStore, UrlCacheStore } from '../domain/ports/key-value-store.port';

/** Estado compartido por todas las empresas de una corrida */
export interface RunContext {
  urlCache: UrlCacheStore;
  resultsCache: ResultsCacheStore;
  pageCache: PageCache;
}
