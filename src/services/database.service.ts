import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { KitConfig } from '../config/configuration';
import { CLINIC_ENTITIES } from '../models';

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  public dataSource: DataSource | null = null;
  private readonly logger = new Logger(DatabaseService.name);

  constructor(private readonly configService: ConfigService<KitConfig, true>) {}

  async onModuleInit(): Promise<void> {
    const { connectOnStartup } = this.configService.get('source', { infer: true });
    if (connectOnStartup) {
      this.logger.log('Source connection required at startup (SHOULD_CONNECT_DB=true), initializing...');
      await this.getDataSource();
    } else {
      this.logger.log('Source connection deferred until first use (SHOULD_CONNECT_DB is not true).');
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.closeConnections();
  }

  async getDataSource(): Promise<DataSource> {
    if (this.dataSource && this.dataSource.isInitialized) {
      return this.dataSource;
    }

    const source = this.configService.get('source', { infer: true });
    try {
      this.dataSource = new DataSource({
        type: 'postgres',
        host: source.host,
        port: source.port,
        username: source.username,
        password: source.password,
        database: source.database,
        schema: source.schema,
        ssl: source.ssl ? { rejectUnauthorized: source.sslRejectUnauthorized } : false,
        entities: CLINIC_ENTITIES,
        synchronize: false,
      });
      await this.dataSource.initialize();
      this.logger.log(`Source database connected (${source.host}:${source.port}/${source.database}, schema ${source.schema})`);
      return this.dataSource;
    } catch (error) {
      this.dataSource = null;
      this.logger.error('Error initializing source database connection', error instanceof Error ? error.stack : String(error));
      throw error;
    }
  }

  async closeConnections(): Promise<void> {
    if (this.dataSource && this.dataSource.isInitialized) {
      await this.dataSource.destroy();
      this.logger.log('Source database connection closed.');
    }
    this.dataSource = null;
  }
}
