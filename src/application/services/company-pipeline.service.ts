import { Inject, Injectable, Logger } from '@nestjs/common';
import { CompanyEntry } from '../../domain/entities/company-entry.entity';
import { CompanyResult } from '../../domain/entities/company-result.entity';
import { hasContactChannels } from '../../domain/entities/contact-info.entity';
import { hasAnyPage } from '../../domain/entities/page-set.entity';
import {
  FailureReason,
  ResultSource,
  ResultStatus,
} from '../../domain/enums/result-status.enum';
import {
  CONTENT_EXTRACTOR_PORT,
  ContentExtractorPort,
} from '../../domain/ports/content-extractor.port';
import { cleanCompanyName, detectSkipReason } from '../../shared/utils/company-name-cleaner';
import { errorMessage } from '../../shared/utils/error-message';
import { RunContext } from '../run-context';
import { IdentityResolverService } from './identity-resolver.service';
import { PageSetGathererService } from './page-set-gatherer.service';

/**
 * Procesa una empresa de punta a punta:
 *
 *   cache → skip? → resolver web → juntar páginas → extraer
 *         → fallback a directorio (JustDial / IndiaMART) si no hay email ni teléfono
 *
 * Nunca lanza: cualquier excepción termina como status "failed".
 */
@Injectable()
export class CompanyPipelineService {
  private readonly logger = new Logger(CompanyPipelineService.name);

  constructor(
    private readonly resolver: IdentityResolverService,
    private readonly gatherer: PageSetGathererService,
    @Inject(CONTENT_EXTRACTOR_PORT) private readonly extractor: ContentExtractorPort,
  ) {}

  async process(entry: CompanyEntry, ctx: RunContext): Promise<CompanyResult> {
    const id = entry.id;
    const name = cleanCompanyName(entry.fname);

    const cached = ctx.resultsCache.get(id);
    if (cached) {
      this.logger.log(`[${id}] "${name}" — ya procesada (cache)`);
      return cached;
    }

    const skipReason = detectSkipReason(name);
    if (skipReason) {
      this.logger.log(`[${id}] "${name}" — omitida (${skipReason})`);
      return CompanyResult.skipped(id, entry.fname, skipReason);
    }

    const result = new CompanyResult({ id, fname: entry.fname });

    try {
      const resolution = await this.resolver.resolve(name, ctx.urlCache);
      const officialUrl = resolution.url;

      if (officialUrl) {
        result.websiteUrl = officialUrl;
        this.logger.log(`[${id}] "${name}" → ${officialUrl}${resolution.cached ? ' (cache)' : ''}`);

        const pages = await this.gatherer.gather(officialUrl, ctx.pageCache);
        if (hasAnyPage(pages)) {
          result.applyContactInfo(this.extractor.extract(pages));
          result.source = ResultSource.OFFICIAL_WEBSITE;
          result.status = result.hasData ? ResultStatus.SUCCESS : ResultStatus.PARTIAL;
        } else {
          result.status = ResultStatus.PARTIAL;
          result.error = FailureReason.COULD_NOT_FETCH_PAGES;
        }
      }

      const needsDirectory =
        (result.status === ResultStatus.FAILED || result.status === ResultStatus.PARTIAL) &&
        !hasContactChannels(result);

      if (needsDirectory) {
        const directoryUrl =
          resolution.directoryUrl ?? (await this.resolver.findDirectoryUrl(name));

        if (directoryUrl) {
          result.websiteUrl = result.websiteUrl ?? directoryUrl;
          const pages = await this.gatherer.gather(directoryUrl, ctx.pageCache);

          if (hasAnyPage(pages)) {
            result.fillMissing(this.extractor.extract(pages));
            result.source = officialUrl
              ? ResultSource.OFFICIAL_WEBSITE_AND_DIRECTORY
              : ResultSource.DIRECTORY;
            result.status = result.hasData ? ResultStatus.SUCCESS : ResultStatus.PARTIAL;
            this.logger.log(`[${id}] "${name}" — directorio ${directoryUrl}`);
          }
        }
      }

      if (!result.websiteUrl) {
        result.error = FailureReason.NO_WEBSITE_FOUND;
      }
    } catch (error) {
      result.status = ResultStatus.FAILED;
      result.error = errorMessage(error);
      this.logger.error(`[${id}] "${name}" — error: ${result.error}`);
      return result;
    }

    this.logger.log(`[${id}] "${name}" — ${result.summary}`);
    return result;
  }
}
