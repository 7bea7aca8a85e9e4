import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScraperCoreModule } from './infrastructure/scraper-core.module';
import { scraperConfig } from './shared/config/scraper.config';

/** Igual que AppModule pero sin HTTP: sólo el núcleo, para el CLI */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [scraperConfig],
      envFilePath: ['.env', '.env.local'],
    }),
    ScraperCoreModule,
  ],
})
export class CliModule {}
