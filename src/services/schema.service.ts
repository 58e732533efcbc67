import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Table, TableForeignKey } from 'typeorm';
import { KitConfig } from '../config/configuration';
import { CLINIC_TABLES } from '../models';
import { quoteIdentifier } from '../utils/sql-identifiers';
import { DatabaseService } from './database.service';

export interface ReadinessReport {
  schema: string;
  publication: string;
  walLevel: string;
  logicalReplication: boolean;
  publicationExists: boolean;
  publishedTables: string[];
  missingTables: string[];
  ready: boolean;
}

/**
 * Prepares the PostgreSQL source for the connector: replication rights, a
 * fresh schema with the clinic tables, and a publication covering them.
 */
@Injectable()
export class SchemaService {
  private readonly logger = new Logger(SchemaService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly configService: ConfigService<KitConfig, true>,
  ) {}

  /**
   * The replication grant, then the statements run with the table DDL in one
   * transaction.
   */
  statements(): { grant: string; before: string[]; after: string[] } {
    const source = this.configService.get('source', { infer: true });
    const schema = quoteIdentifier(source.schema, 'schema');
    const publication = quoteIdentifier(source.publication, 'publication');
    const tables = CLINIC_TABLES.map((table) => `${schema}.${quoteIdentifier(table, 'table')}`).join(', ');

    return {
      grant: `ALTER USER ${quoteIdentifier(source.replicationUser, 'replication user')} WITH REPLICATION`,
      before: [
        `DROP PUBLICATION IF EXISTS ${publication}`,
        `DROP SCHEMA IF EXISTS ${schema} CASCADE`,
        `CREATE SCHEMA ${schema}`,
      ],
      after: [`CREATE PUBLICATION ${publication} FOR TABLE ${tables}`],
    };
  }

  async initialize(): Promise<ReadinessReport> {
    const { grant, before, after } = this.statements();
    const dataSource = await this.databaseService.getDataSource();

    // Non-superusers on managed services cannot grant REPLICATION; the role may already carry it.
    try {
      this.logger.log(grant);
      await dataSource.query(grant);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Replication grant failed, continuing: ${reason}`);
    }

    const queryRunner = dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();
    try {
      for (const statement of before) {
        this.logger.log(statement);
        await queryRunner.query(statement);
      }

      this.logger.log('Creating clinic tables, constraints and indexes');
      const tables = new Map<string, Table>();
      for (const metadata of dataSource.entityMetadatas) {
        const table = Table.create(metadata, dataSource.driver);
        await queryRunner.createTable(table);
        tables.set(metadata.name, table);
      }
      for (const metadata of dataSource.entityMetadatas) {
        const table = tables.get(metadata.name);
        if (table && metadata.foreignKeys.length > 0) {
          await queryRunner.createForeignKeys(
            table,
            metadata.foreignKeys.map((foreignKey) => TableForeignKey.create(foreignKey, dataSource.driver)),
          );
        }
      }

      for (const statement of after) {
        this.logger.log(statement);
        await queryRunner.query(statement);
      }
      await queryRunner.commitTransaction();
    } catch (error) {
      await queryRunner.rollbackTransaction();
      this.logger.error('Error initializing the source schema', error instanceof Error ? error.stack : String(error));
      throw error;
    } finally {
      await queryRunner.release();
    }

    return this.readiness();
  }

  async readiness(): Promise<ReadinessReport> {
    const { schema, publication } = this.configService.get('source', { infer: true });
    const dataSource = await this.databaseService.getDataSource();

    const walRows: Array<{ wal_level: string }> = await dataSource.query('SHOW wal_level');
    const walLevel = walRows[0]?.wal_level ?? 'unknown';

    const publications: Array<{ pubname: string }> = await dataSource.query(
      'SELECT pubname FROM pg_publication WHERE pubname = $1',
      [publication],
    );
    const tableRows: Array<{ tablename: string }> = await dataSource.query(
      'SELECT tablename FROM pg_publication_tables WHERE pubname = $1 AND schemaname = $2 ORDER BY tablename',
      [publication, schema],
    );

    const publishedTables = tableRows.map((row) => row.tablename).sort();
    const missingTables = CLINIC_TABLES.filter((table) => !publishedTables.includes(table));
    const logicalReplication = walLevel === 'logical';
    const publicationExists = publications.length > 0;
    const ready = logicalReplication && publicationExists && missingTables.length === 0;

    if (!logicalReplication) {
      this.logger.warn(`wal_level is "${walLevel}"; logical replication requires "logical"`);
    }

    return {
      schema,
      publication,
      walLevel,
      logicalReplication,
      publicationExists,
      publishedTables,
      missingTables,
      ready,
    };
  }
}
