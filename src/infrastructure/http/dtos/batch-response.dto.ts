import { ApiProperty } from '@nestjs/swagger';
import { FetchTier } from '../../../domain/enums/fetch-tier.enum';
import { ResultSource, ResultStatus } from '../../../domain/enums/result-status.enum';
import { BatchReportJson, ResultRecordJson } from '../../persistence/record.codecs';

// ──────────────────────────────────────────────────────────
// Response DTOs: solo para documentar la forma del JSON
// ──────────────────────────────────────────────────────────

export class ResultRecordDto implements ResultRecordJson {
  @ApiProperty({ example: '1' })
  id!: string;

  @ApiProperty({ example: 'Acme Technologies Pvt Ltd' })
  fname!: string;

  @ApiProperty({ example: 'https://acme.in/', nullable: true, type: String })
  website_url!: string | null;

  @ApiProperty({ example: ['info@acme.in'] })
  emails!: string[];

  @ApiProperty({ example: ['+91 98765 43210'] })
  phone_numbers!: string[];

  @ApiProperty({ nullable: true, type: String })
  about!: string | null;

  @ApiProperty({ example: '12 MG Road, Bengaluru 560001', nullable: true, type: String })
  address!: string | null;

  @ApiProperty({ example: '29ABCDE1234F1Z5', nullable: true, type: String })
  gstin!: string | null;

  @ApiProperty({ example: 'U72200KA2010PTC012345', nullable: true, type: String })
  cin!: string | null;

  @ApiProperty({ enum: ResultSource })
  source!: string;

  @ApiProperty({ enum: ResultStatus })
  status!: string;

  @ApiProperty({ example: null, nullable: true, type: String })
  error!: string | null;
}

export class SkippedEntryDto {
  @ApiProperty({ example: '7' })
  id!: string;

  @ApiProperty({ example: 'N/A' })
  fname!: string;

  @ApiProperty({ example: 'generic_or_invalid_name' })
  reason!: string;
}

export class BatchSummaryDto {
  @ApiProperty({ example: 120 })
  total_input!: number;

  @ApiProperty({ example: '1-50' })
  processed_range!: string;

  @ApiProperty({ example: 50 })
  range_count!: number;

  @ApiProperty({ example: 4 })
  skipped!: number;

  @ApiProperty({ example: 31 })
  success!: number;

  @ApiProperty({ example: 9 })
  partial!: number;

  @ApiProperty({ example: 6 })
  failed!: number;
}

export class BatchResponseDto implements BatchReportJson {
  @ApiProperty({ type: [ResultRecordDto] })
  results!: ResultRecordDto[];

  @ApiProperty({ type: [SkippedEntryDto] })
  skipped!: SkippedEntryDto[];

  @ApiProperty({ type: BatchSummaryDto })
  summary!: BatchSummaryDto;
}

export class TierStatusDto {
  @ApiProperty({ enum: FetchTier, example: FetchTier.TRANSPORT })
  tier!: FetchTier;

  @ApiProperty({ example: true })
  available!: boolean;

  @ApiProperty({ example: 140 })
  usageCount!: number;

  @ApiProperty({ example: 118 })
  successCount!: number;

  @ApiProperty({ example: 22 })
  failCount!: number;

  @ApiProperty({ example: 0.84 })
  successRate!: number;

  @ApiProperty({ example: 640 })
  avgResponseTimeMs!: number;

  @ApiProperty({ example: { blocked: 12, timeout: 10 } })
  failures!: Record<string, number>;
}

export class HealthResponseDto {
  @ApiProperty({ example: 'ok' })
  status!: string;

  @ApiProperty({ example: 1234.5, description: 'Segundos desde que arrancó el proceso' })
  uptime!: number;

  @ApiProperty({ example: false })
  batchRunning!: boolean;

  @ApiProperty({ type: [TierStatusDto] })
  tiers!: TierStatusDto[];
}
