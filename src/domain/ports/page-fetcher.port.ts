import { FetchOutcome } from '../entities/fetch-outcome.entity';
import { FetchTier } from '../enums/fetch-tier.enum';

/**
 * Token de inyección para la lista ordenada de tiers.
 */
export const PAGE_FETCHER_TIERS = 'PAGE_FETCHER_TIERS';

/**
 * Un nivel de descarga. Todos comparten el mismo contrato para que el
 * fetcher pueda recorrerlos en orden sin saber cómo descargan.
 */
export interface PageFetcherPort {
  readonly tier: FetchTier;

  /** Nunca debería lanzar: los fallos vuelven como `{ ok: false }` */
  fetch(url: string): Promise<FetchOutcome>;
}
