import { FetchTier } from '../enums/fetch-tier.enum';

export interface TierSnapshot {
  tier: FetchTier;
  available: boolean;
  usageCount: number;
  successCount: number;
  failCount: number;
  successRate: number;
  avgResponseTimeMs: number;
  failures: Record<string, number>;
}

/**
 * Estadísticas de uso de un tier de descarga.
 * Se exponen en /contacts/health para ver cuánto se está escalando.
 */
export class TierStatus {
  tier: FetchTier;
  /** false cuando el tier no puede funcionar en este proceso (p.ej. sin Chromium) */
  available: boolean;
  usageCount: number;
  successCount: number;
  failCount: number;
  avgResponseTimeMs: number;
  /** Conteo por motivo de fallo (blocked, timeout, ...) */
  failures: Record<string, number>;

  constructor(tier: FetchTier) {
    this.tier = tier;
    this.available = true;
    this.usageCount = 0;
    this.successCount = 0;
    this.failCount = 0;
    this.avgResponseTimeMs = 0;
    this.failures = {};
  }

  get successRate(): number {
    const total = this.successCount + this.failCount;
    return total > 0 ? this.successCount / total : 0;
  }

  recordUse(success: boolean, responseTimeMs: number, failureReason?: string): void {
    this.usageCount++;

    if (success) {
      this.successCount++;
    } else {
      this.failCount++;
      if (failureReason) {
        this.failures[failureReason] = (this.failures[failureReason] ?? 0) + 1;
      }
    }

    // Promedio móvil del tiempo de respuesta
    this.avgResponseTimeMs =
      (this.avgResponseTimeMs * (this.usageCount - 1) + responseTimeMs) / this.usageCount;
  }

  markUnavailable(): void {
    this.available = false;
  }

  toJSON(): TierSnapshot {
    return {
      tier: this.tier,
      available: this.available,
      usageCount: this.usageCount,
      successCount: this.successCount,
      failCount: this.failCount,
      successRate: Math.round(this.successRate * 100) / 100,
      avgResponseTimeMs: Math.round(this.avgResponseTimeMs),
      failures: { ...this.failures },
    };
  }
}
