import { Module } from '@nestjs/common';
import { ScraperCoreModule } from '../scraper-core.module';
import { ContactsController } from './controllers/contacts.controller';

@Module({
  imports: [ScraperCoreModule],
  controllers: [ContactsController],
})
export class ContactsModule {}
