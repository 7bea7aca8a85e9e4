import { CompanyResult } from '../entities/company-result.entity';
import { ResolutionRecord } from '../entities/resolution.entity';

/** Cache nombre normalizado → resolución */
export const URL_CACHE_STORE = 'URL_CACHE_STORE';

/** Cache id de empresa → resultado final */
export const RESULTS_CACHE_STORE = 'RESULTS_CACHE_STORE';

/**
 * Almacén clave-valor persistente.
 * Las escrituras quedan en memoria hasta el siguiente `flush()`.
 */
export interface KeyValueStore<T> {
  /** Carga el contenido persistido; un archivo ausente o corrupto deja el store vacío */
  load(): Promise<void>;
  get(key: string): T | undefined;
  has(key: string): boolean;
  set(key: string, value: T): void;
  flush(): Promise<void>;
  readonly size: number;
}

export type UrlCacheStore = KeyValueStore<ResolutionRecord>;
export type ResultsCacheStore = KeyValueStore<CompanyResult>;
