import { CompanyResult } from '../../domain/entities/company-result.entity';
import { BatchReport } from '../../domain/entities/batch-report.entity';
import { ResolutionRecord } from '../../domain/entities/resolution.entity';
import { ResultSource, ResultStatus } from '../../domain/enums/result-status.enum';
import { RecordCodec } from './json-file.store';

/** Forma persistida / de salida de un resultado (snake_case) */
export interface ResultRecordJson {
  id: string;
  fname: string;
  website_url: string | null;
  emails: string[];
  phone_numbers: string[];
  about: string | null;
  address: string | null;
  gstin: string | null;
  cin: string | null;
  source: string;
  status: string;
  error: string | null;
}

export interface BatchReportJson {
  results: ResultRecordJson[];
  skipped: Array<{ id: string; fname: string; reason: string }>;
  summary: {
    total_input: number;
    processed_range: string;
    range_count: number;
    skipped: number;
    success: number;
    partial: number;
    failed: number;
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null | undefined {
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? value : undefined;
}

function stringArray(value: unknown): string[] | null {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) return null;
  return value.every((v): v is string => typeof v === 'string') ? value : null;
}

function enumValue<E extends string>(values: readonly E[], raw: unknown): E | undefined {
  return values.find((v) => v === raw);
}

const STATUSES = Object.values(ResultStatus);
const SOURCES = Object.values(ResultSource);

export function toResultRecord(result: CompanyResult): ResultRecordJson {
  return {
    id: result.id,
    fname: result.fname,
    website_url: result.websiteUrl,
    emails: result.emails,
    phone_numbers: result.phoneNumbers,
    about: result.about,
    address: result.address,
    gstin: result.gstin,
    cin: result.cin,
    source: result.source,
    status: result.status,
    error: result.error,
  };
}

export function fromResultRecord(raw: unknown): CompanyResult | null {
  if (!isObject(raw)) return null;

  const id = typeof raw.id === 'number' ? String(raw.id) : raw.id;
  const status = enumValue(STATUSES, raw.status);
  const source = enumValue(SOURCES, raw.source ?? ResultSource.NONE);
  const emails = stringArray(raw.emails);
  const phoneNumbers = stringArray(raw.phone_numbers);
  const fields = {
    websiteUrl: optionalString(raw.website_url),
    about: optionalString(raw.about),
    address: optionalString(raw.address),
    gstin: optionalString(raw.gstin),
    cin: optionalString(raw.cin),
    error: optionalString(raw.error),
  };

  if (typeof id !== 'string' || typeof raw.fname !== 'string') return null;
  if (!status || !source || !emails || !phoneNumbers) return null;
  if (Object.values(fields).some((v) => v === undefined)) return null;

  return new CompanyResult({
    id,
    fname: raw.fname,
    emails,
    phoneNumbers,
    status,
    source,
    websiteUrl: fields.websiteUrl,
    about: fields.about,
    address: fields.address,
    gstin: fields.gstin,
    cin: fields.cin,
    error: fields.error,
  });
}

export const resultRecordCodec: RecordCodec<CompanyResult> = {
  decode: fromResultRecord,
  encode: toResultRecord,
};

export const resolutionRecordCodec: RecordCodec<ResolutionRecord> = {
  decode(raw: unknown): ResolutionRecord | null {
    if (!isObject(raw)) return null;
    const url = optionalString(raw.url);
    const directoryUrl = optionalString(raw.directory_url);
    if (url === undefined || directoryUrl === undefined) return null;
    return { url, directoryUrl };
  },
  encode(value: ResolutionRecord): unknown {
    return { url: value.url, directory_url: value.directoryUrl };
  },
};

export function toBatchReportJson(report: BatchReport): BatchReportJson {
  return {
    results: report.results.map(toResultRecord),
    skipped: report.skipped.map((s) => ({ id: s.id, fname: s.fname, reason: s.reason })),
    summary: {
      total_input: report.summary.totalInput,
      processed_range: report.summary.processedRange,
      range_count: report.summary.rangeCount,
      skipped: report.summary.skipped,
      success: report.summary.success,
      partial: report.summary.partial,
      failed: report.summary.failed,
    },
  };
}
