import { randomBetween, sleep } from './timing';

export interface RateGateOptions {
  /** Separación mínima entre inicios de llamadas (ms) */
  minIntervalMs: number;
  /** Separación máxima; el intervalo real es aleatorio entre ambos */
  maxIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Leaky bucket para una dependencia externa.
 *
 * Cada llamada reserva un turno: slot = max(ahora, próximoTurno) y el
 * siguiente turno queda a slot + intervalo aleatorio. La reserva es
 * síncrona, así que llamadas concurrentes nunca comparten turno.
 */
export class RateGate {
  private nextSlot = 0;
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: RateGateOptions) {
    this.now = options.now ?? Date.now;
    this.wait = options.sleep ?? sleep;
  }

  /** Espera hasta el turno reservado. Devuelve los ms esperados. */
  async acquire(): Promise<number> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot =
      slot + randomBetween(this.options.minIntervalMs, this.options.maxIntervalMs);

    const waitMs = slot - now;
    await this.wait(waitMs);
    return waitMs;
  }

  /** true si el próximo turno ya pasó: el gate no retiene a nadie */
  isIdle(): boolean {
    return this.nextSlot <= this.now();
  }

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    return task();
  }
}

/**
 * Un RateGate por host, creado bajo demanda.
 * Al crear uno se descartan los inactivos, así el mapa no crece sin límite.
 */
export class HostRateGates {
  private readonly gates = new Map<string, RateGate>();

  constructor(private readonly options: RateGateOptions) {}

  forUrl(url: string): RateGate {
    let host: string;
    try {
      host = new URL(url).host.toLowerCase();
    } catch {
      host = url;
    }

    let gate = this.gates.get(host);
    if (!gate) {
      this.prune();
      gate = new RateGate(this.options);
      this.gates.set(host, gate);
    }
    return gate;
  }

  private prune(): void {
    for (const [host, gate] of this.gates) {
      if (gate.isIdle()) this.gates.delete(host);
    }
  }

  get size(): number {
    return this.gates.size;
  }
}
