import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { Public } from '../../auth/public.decorator';
import { BatchOrchestratorService } from '../../../application/services/batch-orchestrator.service';
import { TieredFetcherService } from '../../../application/services/tiered-fetcher.service';
import { toBatchReportJson } from '../../persistence/record.codecs';
import { BatchRunDto } from '../dtos/batch-run.dto';
import { BatchResponseDto, HealthResponseDto } from '../dtos/batch-response.dto';

@ApiTags('Contacts')
@ApiSecurity('x-api-key')
@Controller('contacts')
@UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
export class ContactsController {
  private readonly logger = new Logger(ContactsController.name);

  constructor(
    private readonly orchestrator: BatchOrchestratorService,
    private readonly fetcher: TieredFetcherService,
  ) {}

  /**
   * POST /contacts/batch
   *
   * Procesa la lista (o el rango start–end) y devuelve resultados + resumen.
   * Lo ya procesado sale del cache de resultados sin tocar la red.
   */
  @Post('batch')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Buscar datos de contacto de un lote de empresas',
    description:
      'Resuelve la web oficial de cada empresa, descarga home/about/contacto y extrae ' +
      'emails, teléfonos, dirección, GSTIN y CIN. Responde 409 si ya hay un lote corriendo.',
  })
  @ApiResponse({ status: 200, type: BatchResponseDto })
  @ApiResponse({ status: 400, description: 'Entrada o rango inválido' })
  @ApiResponse({ status: 409, description: 'Ya hay un lote en ejecución' })
  async runBatch(@Body() dto: BatchRunDto): Promise<BatchResponseDto> {
    this.logger.log(
      `📦 Lote: ${dto.entries.length} empresas | rango: ${dto.start ?? 1}-${dto.end ?? dto.entries.length}`,
    );

    const report = await this.orchestrator.run(dto.entries, { start: dto.start, end: dto.end });
    return toBatchReportJson(report);
  }

  /**
   * GET /contacts/health, sin x-api-key
   */
  @Public()
  @Get('health')
  @ApiOperation({ summary: 'Estado del servicio y de los tiers de descarga' })
  @ApiResponse({ status: 200, type: HealthResponseDto })
  health(): HealthResponseDto {
    return {
      status: 'ok',
      uptime: process.uptime(),
      batchRunning: this.orchestrator.isRunning,
      tiers: this.fetcher.getStatuses().map((s) => s.toJSON()),
    };
  }
}
