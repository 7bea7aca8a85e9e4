import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { KeyValueStore } from '../../domain/ports/key-value-store.port';
import { errorMessage } from '../../shared/utils/error-message';

/** Traduce entre el valor de dominio y su forma en el JSON */
export interface RecordCodec<T> {
  /** null si la entrada no tiene la forma esperada */
  decode(raw: unknown): T | null;
  encode(value: T): unknown;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Store clave-valor respaldado por un único archivo JSON plano ({ clave: valor }).
 *
 * - `load()` con archivo ausente o corrupto deja el store vacío (con warning)
 * - Entradas con forma inválida se descartan al cargar
 * - `flush()` escribe a un temporal y renombra: el archivo nunca queda a medias
 */
export class JsonFileStore<T> implements KeyValueStore<T> {
  private readonly logger: Logger;
  private entries = new Map<string, T>();

  constructor(
    readonly filePath: string,
    private readonly codec: RecordCodec<T>,
  ) {
    this.logger = new Logger(`JsonFileStore:${path.basename(filePath)}`);
  }

  async load(): Promise<void> {
    this.entries = new Map();

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.log(`Sin cache previo en ${this.filePath}`);
      } else {
        this.logger.warn(`No se pudo leer ${this.filePath}: ${errorMessage(error)}; se empieza vacío`);
      }
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`⚠️ ${this.filePath} está corrupto (${errorMessage(error)}); se empieza vacío`);
      return;
    }

    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      this.logger.warn(`⚠️ ${this.filePath} no es un objeto JSON; se empieza vacío`);
      return;
    }

    let dropped = 0;
    for (const [key, value] of Object.entries(data)) {
      const decoded = this.codec.decode(value);
      if (decoded === null) {
        dropped++;
        continue;
      }
      this.entries.set(key, decoded);
    }

    this.logger.log(
      `📂 ${this.entries.size} entradas cargadas de ${this.filePath}` +
        (dropped > 0 ? ` (${dropped} inválidas descartadas)` : ''),
    );
  }

  get(key: string): T | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, value: T): void {
    this.entries.set(key, value);
  }

  get size(): number {
    return this.entries.size;
  }

  async flush(): Promise<void> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of this.entries) {
      out[key] = this.codec.encode(value);
    }

    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });

    const tmp = path.join(dir, `.${path.basename(this.filePath)}.${randomUUID()}.tmp`);
    await fs.writeFile(tmp, JSON.stringify(out, null, 2), 'utf-8');
    try {
      await fs.rename(tmp, this.filePath);
    } catch (error) {
      await fs.unlink(tmp).catch((err: unknown) =>
        this.logger.debug(`No se pudo borrar ${tmp}: ${errorMessage(err)}`),
      );
      throw error;
    }
  }
}
