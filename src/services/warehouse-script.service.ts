import { Injectable, Logger } from '@nestjs/common';
import { ProvisioningService } from './provisioning.service';
import { QueryCatalogService, QueryScript } from './query-catalog.service';

export const SCRIPT_KINDS = ['provision', 'verify', 'analytics'] as const;

export type ScriptKind = (typeof SCRIPT_KINDS)[number];

export function isScriptKind(value: string): value is ScriptKind {
  return SCRIPT_KINDS.some((kind) => kind === value);
}

const HEADERS: Record<QueryScript, string[]> = {
  verify: [
    '-- Snapshot verification queries for the clinic CDC demo',
    "-- Run in the warehouse once the connector's initial snapshot has loaded.",
  ],
  analytics: [
    '-- Analytics and CDC audit queries for the clinic CDC demo',
    '-- Run in the warehouse while or after the live-activity simulation runs.',
  ],
};

@Injectable()
export class WarehouseScriptService {
  private readonly logger = new Logger(WarehouseScriptService.name);

  constructor(
    private readonly provisioningService: ProvisioningService,
    private readonly queryCatalogService: QueryCatalogService,
  ) {}

  async render(kind: ScriptKind): Promise<string> {
    if (kind === 'provision') {
      return this.provisioningService.render();
    }

    const queries = await this.queryCatalogService.list(kind);
    const { schema, database, warehouse, role } = this.queryCatalogService.placeholders();
    const preamble = [
      `USE ROLE ${role};`,
      `USE DATABASE ${database};`,
      `USE SCHEMA ${schema};`,
      `USE WAREHOUSE ${warehouse};`,
    ];

    const sections = queries.map((query) => {
      const comments = [`-- ${query.id}: ${query.title}`];
      if (query.expect) {
        comments.push(`-- Expected: ${query.expect}`);
      }
      return [...comments, this.queryCatalogService.render(query)].join('\n');
    });

    this.logger.log(`Rendered ${kind} script with ${queries.length} queries`);
    return [
      ...HEADERS[kind],
      `-- Metadata profile: ${this.queryCatalogService.profile}`,
      '',
      ...preamble,
      '',
      sections.join('\n\n'),
      '',
    ].join('\n');
  }
}
