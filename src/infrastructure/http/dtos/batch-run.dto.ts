import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsArray, IsInt, IsOptional, Min, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { CompanyEntryDto } from './company-entry.dto';

/**
 * Lote a procesar. start/end son 1-based e inclusivos;
 * sin ellos se procesa la lista completa.
 */
export class BatchRunDto {
  @ApiProperty({
    type: [CompanyEntryDto],
    example: [
      { id: '1', fname: 'Acme Technologies Pvt Ltd' },
      { id: '2', fname: 'sulekha.com' },
    ],
  })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CompanyEntryDto)
  entries!: CompanyEntryDto[];

  @ApiPropertyOptional({ example: 1, description: 'Índice inicial (1-based, inclusivo)' })
  @IsOptional()
  @IsInt()
  @Min(1)
  start?: number;

  @ApiPropertyOptional({ example: 50, description: 'Índice final (1-based, inclusivo)' })
  @IsOptional()
  @IsInt()
  @Min(1)
  end?: number;
}
