import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pLimit from 'p-limit';
import {
  BatchRange,
  BatchReport,
  SkippedEntry,
} from '../../domain/entities/batch-report.entity';
import { CompanyEntry } from '../../domain/entities/company-entry.entity';
import { CompanyResult } from '../../domain/entities/company-result.entity';
import { PageCache } from '../../domain/entities/page-set.entity';
import { ResultStatus } from '../../domain/enums/result-status.enum';
import {
  RESULTS_CACHE_STORE,
  ResultsCacheStore,
  URL_CACHE_STORE,
  UrlCacheStore,
} from '../../domain/ports/key-value-store.port';
import { BatchAlreadyRunningException, InvalidRangeException } from '../errors/batch.errors';
import { RunContext } from '../run-context';
import { CompanyPipelineService } from './company-pipeline.service';

type StatusCounts = Record<ResultStatus, number>;

/**
 * Corre el pipeline sobre una lista (o un rango 1-based de ella).
 *
 * - Sub-lotes de `batchSize`; dentro de cada uno, `concurrency.pipeline` empresas a la vez
 * - Después de cada sub-lote se persisten ambos caches: si el proceso muere,
 *   se pierde como mucho un sub-lote
 * - Un solo lote a la vez por proceso
 */
@Injectable()
export class BatchOrchestratorService {
  private readonly logger = new Logger(BatchOrchestratorService.name);
  private readonly batchSize: number;
  private readonly pipelineConcurrency: number;
  private running = false;

  constructor(
    private readonly config: ConfigService,
    private readonly pipeline: CompanyPipelineService,
    @Inject(URL_CACHE_STORE) private readonly urlCache: UrlCacheStore,
    @Inject(RESULTS_CACHE_STORE) private readonly resultsCache: ResultsCacheStore,
  ) {
    this.batchSize = Math.max(1, this.config.get<number>('scraper.batchSize', 50));
    this.pipelineConcurrency = Math.max(1, this.config.get<number>('scraper.concurrency.pipeline', 3));
  }

  get isRunning(): boolean {
    return this.running;
  }

  async run(entries: CompanyEntry[], range: BatchRange = {}): Promise<BatchReport> {
    const total = entries.length;
    const [from, to] = this.validateRange(total, range);
    if (from === to) return emptyReport();

    if (this.running) throw new BatchAlreadyRunningException();
    this.running = true;

    try {
      return await this.runRange(entries, from, to);
    } finally {
      this.running = false;
    }
  }

  /**
   * Devuelve [desde, hasta] como índices 0-based, `hasta` exclusivo.
   */
  private validateRange(total: number, range: BatchRange): [number, number] {
    const { start, end } = range;

    if (start !== undefined && (!Number.isInteger(start) || start < 1)) {
      throw new InvalidRangeException(`start debe ser un entero >= 1 (recibido: ${start})`);
    }
    if (end !== undefined && (!Number.isInteger(end) || end > total)) {
      throw new InvalidRangeException(`end debe ser <= ${total} (total de entradas), recibido: ${end}`);
    }
    if (start !== undefined && end !== undefined && start > end) {
      throw new InvalidRangeException(`start (${start}) debe ser <= end (${end})`);
    }

    // Lista vacía sin rango: no hay nada que hacer, pero no es un error
    if (total === 0 && start === undefined && end === undefined) return [0, 0];

    const from = start !== undefined ? start - 1 : 0;
    const to = end !== undefined ? end : total;
    if (from >= to) {
      throw new InvalidRangeException(`El rango ${from + 1}-${to} no selecciona ninguna entrada`);
    }
    return [from, to];
  }

  private async runRange(entries: CompanyEntry[], from: number, to: number): Promise<BatchReport> {
    const total = entries.length;
    const selection = entries.slice(from, to);
    this.logger.log(`🚀 Procesando ${from + 1}–${to} de ${total}`);

    await Promise.all([this.urlCache.load(), this.resultsCache.load()]);
    const ctx: RunContext = {
      urlCache: this.urlCache,
      resultsCache: this.resultsCache,
      pageCache: new PageCache(),
    };

    const counts: StatusCounts = {
      [ResultStatus.SUCCESS]: 0,
      [ResultStatus.PARTIAL]: 0,
      [ResultStatus.FAILED]: 0,
      [ResultStatus.SKIPPED]: 0,
    };
    const results: CompanyResult[] = [];
    const skipped: SkippedEntry[] = [];

    for (let offset = 0; offset < selection.length; offset += this.batchSize) {
      const subBatch = selection.slice(offset, offset + this.batchSize);
      const batchNumber = Math.floor(offset / this.batchSize) + 1;
      this.logger.log(
        `--- Sub-lote ${batchNumber} (${offset + 1}–${offset + subBatch.length} de ${selection.length} en el rango) ---`,
      );

      const limit = pLimit(this.pipelineConcurrency);
      const batchResults = await Promise.all(
        subBatch.map((entry) => limit(() => this.pipeline.process(entry, ctx))),
      );

      for (const result of batchResults) {
        counts[result.status]++;
        if (result.status === ResultStatus.SKIPPED) {
          skipped.push({ id: result.id, fname: result.fname, reason: result.error ?? 'unknown' });
        } else {
          results.push(result);
        }
        this.resultsCache.set(result.id, result);
      }

      await Promise.all([this.urlCache.flush(), this.resultsCache.flush()]);

      this.logger.log(
        `--- Sub-lote ${batchNumber} listo. Acumulado: success=${counts.success}, ` +
          `partial=${counts.partial}, failed=${counts.failed}, skipped=${counts.skipped} ---`,
      );
    }

    const summary = {
      totalInput: total,
      processedRange: `${from + 1}-${to}`,
      rangeCount: selection.length,
      skipped: counts.skipped,
      success: counts.success,
      partial: counts.partial,
      failed: counts.failed,
    };
    this.logger.log(`✅ Lote terminado: ${JSON.stringify(summary)}`);

    return { results, skipped, summary };
  }
}

function emptyReport(): BatchReport {
  return {
    results: [],
    skipped: [],
    summary: {
      totalInput: 0,
      processedRange: '1-0',
      rangeCount: 0,
      skipped: 0,
      success: 0,
      partial: 0,
      failed: 0,
    },
  };
}
