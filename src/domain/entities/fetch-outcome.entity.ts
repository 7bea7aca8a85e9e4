import { FetchFailureReason, FetchTier } from '../enums/fetch-tier.enum';

export type FetchOutcome =
  | { ok: true; html: string; status: number }
  | { ok: false; reason: FetchFailureReason; status?: number; detail?: string };

export interface FetchAttempt {
  tier: FetchTier;
  outcome: FetchOutcome;
  elapsedMs: number;
}

/** Resultado de recorrer los tiers para una URL */
export interface DetailedFetch {
  url: string;
  html: string | null;
  /** Tier que consiguió la página, null si ninguno */
  tier: FetchTier | null;
  attempts: FetchAttempt[];
}

export function fetchFailure(
  reason: FetchFailureReason,
  detail?: string,
  status?: number,
): FetchOutcome {
  return {
    ok: false,
    reason,
    ...(status !== undefined ? { status } : {}),
    ...(detail !== undefined ? { detail } : {}),
  };
}
