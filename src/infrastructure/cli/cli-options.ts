import { parseArgs } from 'util';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { InvalidInputException } from '../../application/errors/batch.errors';
import { BatchSummary } from '../../domain/entities/batch-report.entity';
import { CompanyEntry } from '../../domain/entities/company-entry.entity';
import { CompanyEntryDto } from '../http/dtos/company-entry.dto';
import { errorMessage } from '../../shared/utils/error-message';

export class CliArgumentError extends Error {}

export interface CliOptions {
  input: string;
  output: string;
  start?: number;
  end?: number;
}

export const USAGE = `Uso:
  scrape --input companies.json --output results.json [--start N] [--end M]

  -i, --input   JSON de entrada: [{ "id": ..., "fname": "..." }, ...]
  -o, --output  Archivo de salida
  -s, --start   Índice inicial, 1-based inclusivo (default: 1)
  -e, --end     Índice final, 1-based inclusivo (default: el último)`;

export function parseCliArgs(argv: string[]): CliOptions {
  let values: { input?: string; output?: string; start?: string; end?: string };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        input: { type: 'string', short: 'i' },
        output: { type: 'string', short: 'o' },
        start: { type: 'string', short: 's' },
        end: { type: 'string', short: 'e' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new CliArgumentError(errorMessage(error));
  }

  if (!values.input) throw new CliArgumentError('--input es obligatorio');
  if (!values.output) throw new CliArgumentError('--output es obligatorio');

  return {
    input: values.input,
    output: values.output,
    ...(values.start !== undefined ? { start: parseIndex('--start', values.start) } : {}),
    ...(values.end !== undefined ? { end: parseIndex('--end', values.end) } : {}),
  };
}

function parseIndex(flag: string, raw: string): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new CliArgumentError(`${flag} debe ser un entero (recibido: "${raw}")`);
  }
  return parseInt(raw, 10);
}

/**
 * Valida el JSON de entrada: un array de { id, fname }.
 * Los ids numéricos se pasan a string; campos extra se ignoran.
 */
export function readCompanyEntries(data: unknown): CompanyEntry[] {
  if (!Array.isArray(data)) {
    throw new InvalidInputException('El JSON de entrada debe ser un array de objetos');
  }

  const entries: CompanyEntry[] = [];
  data.forEach((item: unknown, index) => {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      throw new InvalidInputException(`Entrada #${index + 1}: se esperaba un objeto { id, fname }`);
    }

    const dto = plainToInstance(CompanyEntryDto, item);
    const errors = validateSync(dto, { whitelist: true });
    if (errors.length > 0) {
      throw new InvalidInputException(`Entrada #${index + 1}: ${describeErrors(errors)}`);
    }
    entries.push({ id: dto.id, fname: dto.fname });
  });

  return entries;
}

function describeErrors(errors: ValidationError[]): string {
  return errors
    .flatMap((e) => Object.values(e.constraints ?? {}))
    .join('; ');
}

export function formatSummary(summary: BatchSummary): string {
  const rule = '='.repeat(50);
  return [
    '',
    rule,
    'SCRAPING COMPLETE',
    rule,
    `Range:    ${summary.processedRange} (${summary.rangeCount} items)`,
    `Success:  ${summary.success}`,
    `Partial:  ${summary.partial}`,
    `Failed:   ${summary.failed}`,
    `Skipped:  ${summary.skipped}`,
    rule,
  ].join('\n');
}
