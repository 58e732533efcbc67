import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { validate } from './config/env.validation';
import { SourceController } from './controllers/source.controller';
import { WarehouseController } from './controllers/warehouse.controller';
import { CLINIC_STORE } from './interfaces/clinic-store.interface';
import { ClinicStoreService } from './services/clinic-store.service';
import { DatabaseService } from './services/database.service';
import { IntegrityService } from './services/integrity.service';
import { ProvisioningService } from './services/provisioning.service';
import { QueryCatalogService } from './services/query-catalog.service';
import { SchemaService } from './services/schema.service';
import { SeedService } from './services/seed.service';
import { SimulationService } from './services/simulation.service';
import { WarehouseScriptService } from './services/warehouse-script.service';
import { CLOCK, systemClock } from './utils/clock';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validate,
    }),
  ],
  controllers: [SourceController, WarehouseController],
  providers: [
    DatabaseService,
    ClinicStoreService,
    { provide: CLINIC_STORE, useExisting: ClinicStoreService },
    { provide: CLOCK, useValue: systemClock },
    SchemaService,
    SeedService,
    SimulationService,
    IntegrityService,
    ProvisioningService,
    QueryCatalogService,
    WarehouseScriptService,
  ],
})
export class AppModule {}
