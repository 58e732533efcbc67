import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readdir, readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { KitConfig, MetadataProfile } from '../config/configuration';
import { QUERIES_DIR } from '../utils/data-files';
import { assertIdentifier, quoteIdentifier } from '../utils/sql-identifiers';

export const QUERY_SCRIPTS = ['verify', 'analytics'] as const;

export type QueryScript = (typeof QUERY_SCRIPTS)[number];

export type QuerySource = 'common' | MetadataProfile;

export interface WarehouseQuery {
  id: string;
  title: string;
  script: QueryScript;
  order: number;
  expect?: string;
  source: QuerySource;
  body: string;
}

export type QueryPlaceholders = Record<'schema' | 'database' | 'warehouse' | 'role', string>;

export class QueryCatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QueryCatalogError';
  }
}

export class UnknownQueryError extends QueryCatalogError {
  constructor(public readonly queryId: string) {
    super(`Unknown warehouse query "${queryId}"`);
    this.name = 'UnknownQueryError';
  }
}

const FRONT_MATTER_LINE = /^--\s*([a-z]+):\s*(.*)$/;
const QUERY_ID = /^[a-z0-9][a-z0-9-]*$/;
const PLACEHOLDER = /\{\{\s*([A-Za-z_]+)\s*\}\}/g;
const FRONT_MATTER_KEYS = ['id', 'title', 'script', 'order', 'expect'];

function isQueryScript(value: string): value is QueryScript {
  return QUERY_SCRIPTS.some((script) => script === value);
}

function isPlaceholder(name: string, placeholders: QueryPlaceholders): name is keyof QueryPlaceholders {
  return Object.prototype.hasOwnProperty.call(placeholders, name);
}

/**
 * Parses one query file: a block of `-- key: value` lines followed by the SQL
 * body. The trailing semicolon is dropped; rendering adds it back.
 */
export function parseQueryFile(fileName: string, text: string, source: QuerySource): WarehouseQuery {
  const lines = text.replace(/\r\n/g, '\n').split('\n');
  const fields = new Map<string, string>();
  let bodyStart = 0;

  for (; bodyStart < lines.length; bodyStart++) {
    const match = FRONT_MATTER_LINE.exec(lines[bodyStart]);
    if (!match) break;
    const [, key, value] = match;
    if (!FRONT_MATTER_KEYS.includes(key)) {
      throw new QueryCatalogError(`${fileName}: unknown front matter key "${key}"`);
    }
    if (fields.has(key)) {
      throw new QueryCatalogError(`${fileName}: duplicate front matter key "${key}"`);
    }
    fields.set(key, value.trim());
  }

  const required = (key: string): string => {
    const value = fields.get(key);
    if (!value) {
      throw new QueryCatalogError(`${fileName}: missing front matter "-- ${key}:"`);
    }
    return value;
  };

  const id = required('id');
  if (!QUERY_ID.test(id)) {
    throw new QueryCatalogError(`${fileName}: query id "${id}" must be lower-case kebab-case`);
  }
  const script = required('script');
  if (!isQueryScript(script)) {
    throw new QueryCatalogError(`${fileName}: script must be one of ${QUERY_SCRIPTS.join(', ')}, got "${script}"`);
  }
  const order = Number(required('order'));
  if (!Number.isInteger(order)) {
    throw new QueryCatalogError(`${fileName}: order must be an integer`);
  }

  const body = lines.slice(bodyStart).join('\n').trim().replace(/;\s*$/, '').trimEnd();
  if (body === '') {
    throw new QueryCatalogError(`${fileName}: query body is empty`);
  }

  return { id, title: required('title'), script, order, expect: fields.get('expect'), source, body };
}

export function compareQueries(a: WarehouseQuery, b: WarehouseQuery): number {
  if (a.script !== b.script) {
    return QUERY_SCRIPTS.indexOf(a.script) - QUERY_SCRIPTS.indexOf(b.script);
  }
  return a.order - b.order || a.id.localeCompare(b.id);
}

export async function loadQueryCatalog(queriesDir: string, profile: MetadataProfile): Promise<WarehouseQuery[]> {
  const queries: WarehouseQuery[] = [];
  for (const source of ['common', profile] as const) {
    const dir = path.join(queriesDir, source);
    const files = (await readdir(dir)).filter((file) => file.endsWith('.sql')).sort();
    for (const file of files) {
      queries.push(parseQueryFile(`${source}/${file}`, await readFile(path.join(dir, file), 'utf8'), source));
    }
  }

  const seen = new Set<string>();
  for (const query of queries) {
    if (seen.has(query.id)) {
      throw new QueryCatalogError(`Duplicate warehouse query id "${query.id}"`);
    }
    seen.add(query.id);
  }
  return queries.sort(compareQueries);
}

export function substitutePlaceholders(query: WarehouseQuery, placeholders: QueryPlaceholders): string {
  return query.body.replace(PLACEHOLDER, (_token, name: string) => {
    if (!isPlaceholder(name, placeholders)) {
      throw new QueryCatalogError(`Query "${query.id}" uses unknown placeholder {{${name}}}`);
    }
    return placeholders[name];
  });
}

@Injectable()
export class QueryCatalogService {
  private readonly logger = new Logger(QueryCatalogService.name);
  private catalog: WarehouseQuery[] | null = null;

  constructor(private readonly configService: ConfigService<KitConfig, true>) {}

  get profile(): MetadataProfile {
    return this.configService.get('warehouse', { infer: true }).metadataProfile;
  }

  async list(script?: QueryScript): Promise<WarehouseQuery[]> {
    if (!this.catalog) {
      const profile = this.profile;
      this.catalog = await loadQueryCatalog(QUERIES_DIR, profile);
      this.logger.log(`Loaded ${this.catalog.length} warehouse queries (metadata profile ${profile})`);
    }
    const queries = this.catalog;
    return script ? queries.filter((query) => query.script === script) : queries;
  }

  async get(id: string): Promise<WarehouseQuery> {
    const query = (await this.list()).find((candidate) => candidate.id === id);
    if (!query) {
      throw new UnknownQueryError(id);
    }
    return query;
  }

  placeholders(): QueryPlaceholders {
    const warehouse = this.configService.get('warehouse', { infer: true });
    return {
      schema: quoteIdentifier(warehouse.destinationSchema, 'destination schema'),
      database: assertIdentifier(warehouse.database, 'database'),
      warehouse: assertIdentifier(warehouse.warehouse, 'warehouse'),
      role: assertIdentifier(warehouse.runtimeRole, 'runtime role'),
    };
  }

  /** Query text with placeholders filled in, terminated with `;`. */
  render(query: WarehouseQuery): string {
    return `${substitutePlaceholders(query, this.placeholders())};`;
  }
}
