#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CommanderError } from 'commander';
import { AppModule } from './app.module';
import { CliFailure, CliServices, createProgram } from './cli/program';
import { IntegrityService } from './services/integrity.service';
import { QueryCatalogService } from './services/query-catalog.service';
import { SchemaService } from './services/schema.service';
import { SeedService } from './services/seed.service';
import { SimulationService } from './services/simulation.service';
import { WarehouseScriptService } from './services/warehouse-script.service';

const logger = new Logger('ClinicCdcCli');
let app: INestApplicationContext | null = null;

async function loadServices(): Promise<CliServices> {
  if (!app) {
    // --quiet is read before commander parses, since the context is built inside an action.
    const levels: LogLevel[] = process.argv.includes('--quiet') ? ['error', 'warn'] : ['error', 'warn', 'log'];
    app = await NestFactory.createApplicationContext(AppModule, { logger: levels });
  }
  return {
    schema: app.get(SchemaService),
    seed: app.get(SeedService),
    simulation: app.get(SimulationService),
    integrity: app.get(IntegrityService),
    scripts: app.get(WarehouseScriptService),
    queries: app.get(QueryCatalogService),
  };
}

async function main(): Promise<number> {
  try {
    await createProgram(loadServices).parseAsync(process.argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof CliFailure) {
      logger.error(error.message);
    } else {
      logger.error(error instanceof Error ? error.message : String(error), error instanceof Error ? error.stack : undefined);
    }
    return 1;
  } finally {
    if (app) {
      await app.close();
    }
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Failed to close the application context', error instanceof Error ? error.stack : String(error));
    process.exitCode = 1;
  },
);
