import { CompanyResult } from './company-result.entity';

export interface SkippedEntry {
  id: string;
  fname: string;
  reason: string;
}

export interface BatchSummary {
  totalInput: number;
  /** "inicio-fin", 1-based inclusivo */
  processedRange: string;
  rangeCount: number;
  skipped: number;
  success: number;
  partial: number;
  failed: number;
}

export interface BatchReport {
  results: CompanyResult[];
  skipped: SkippedEntry[];
  summary: BatchSummary;
}

export interface BatchRange {
  /** 1-based, inclusivo */
  start?: number;
  end?: number;
}
