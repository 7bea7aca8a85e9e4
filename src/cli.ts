#!/usr/bin/env node
import 'reflect-metadata';
import { promises as fs } from 'fs';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CliModule } from './cli.module';
import { BatchOrchestratorService } from './application/services/batch-orchestrator.service';
import { InvalidInputException, InvalidRangeException } from './application/errors/batch.errors';
import {
  CliArgumentError,
  USAGE,
  formatSummary,
  parseCliArgs,
  readCompanyEntries,
} from './infrastructure/cli/cli-options';
import { toBatchReportJson } from './infrastructure/persistence/record.codecs';
import { errorMessage } from './shared/utils/error-message';

const logger = new Logger('CLI');

async function run(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));

  logger.log(`📥 Leyendo ${options.input}...`);
  const raw = await fs.readFile(options.input, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new InvalidInputException(
      `${options.input} no es JSON válido: ${errorMessage(error)}`,
    );
  }
  const entries = readCompanyEntries(data);
  logger.log(`${entries.length} empresas cargadas`);

  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['log', 'error', 'warn'],
  });

  try {
    const orchestrator = app.get(BatchOrchestratorService);
    const report = await orchestrator.run(entries, { start: options.start, end: options.end });

    await fs.writeFile(options.output, JSON.stringify(toBatchReportJson(report), null, 2), 'utf-8');
    logger.log(`💾 Resultados guardados en ${options.output}`);

    process.stdout.write(`${formatSummary(report.summary)}\n`);
    return 0;
  } finally {
    await app.close();
  }
}

run()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    if (error instanceof CliArgumentError) {
      logger.error(error.message);
      process.stderr.write(`${USAGE}\n`);
    } else if (error instanceof InvalidInputException || error instanceof InvalidRangeException) {
      logger.error(error.message);
    } else {
      logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
    }
    process.exit(1);
  });
