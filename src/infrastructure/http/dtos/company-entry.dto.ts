import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';
import { Transform } from 'class-transformer';

/** Una empresa de la lista. Los ids numéricos se aceptan y se pasan a string. */
export class CompanyEntryDto {
  @ApiProperty({ example: '1042', description: 'Identificador único (string o número)' })
  @Transform(({ value }) => (typeof value === 'number' ? String(value) : value))
  @IsString()
  @IsNotEmpty()
  id!: string;

  @ApiProperty({ example: 'Acme Technologies Pvt Ltd' })
  @IsString()
  fname!: string;
}
