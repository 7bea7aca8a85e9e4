import { ContactInfo } from '../entities/contact-info.entity';
import { PageSet } from '../entities/page-set.entity';

export const CONTENT_EXTRACTOR_PORT = 'CONTENT_EXTRACTOR_PORT';

export interface ContentExtractorPort {
  extract(pages: PageSet): ContactInfo;
}
