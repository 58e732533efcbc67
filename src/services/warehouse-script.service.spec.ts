import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { isScriptKind, WarehouseScriptService } from './warehouse-script.service';
import { ProvisioningService } from './provisioning.service';
import { QueryCatalogService } from './query-catalog.service';
import { loadKitConfig } from '../config/configuration';

const SECTION_HEADER = /^-- [a-z0-9-]+: /;

describe('WarehouseScriptService', () => {
  let service: WarehouseScriptService;
  let env: Record<string, string>;
  const mockConfigService = {
    get: jest.fn((key: 'warehouse') => loadKitConfig(env)[key]),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    env = { WAREHOUSE_SOURCE_ENDPOINT: 'db.example.test:5432' };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WarehouseScriptService,
        ProvisioningService,
        QueryCatalogService,
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<WarehouseScriptService>(WarehouseScriptService);
  });

  it('should recognize the script kinds', () => {
    expect(['provision', 'verify', 'analytics', 'teardown'].map(isScriptKind)).toEqual([true, true, true, false]);
  });

  it('should delegate the provisioning script', async () => {
    const script = await service.render('provision');
    expect(script.split('\n')[0]).toBe('-- Warehouse provisioning for the clinic CDC demo');
  });

  it('should open the verification script with its context', async () => {
    const lines = (await service.render('verify')).split('\n');
    expect(lines.slice(0, 12)).toEqual([
      '-- Snapshot verification queries for the clinic CDC demo',
      "-- Run in the warehouse once the connector's initial snapshot has loaded.",
      '-- Metadata profile: openflow',
      '',
      'USE ROLE QUICKSTART_ROLE;',
      'USE DATABASE QUICKSTART_PGCDC_DB;',
      'USE SCHEMA "healthcare";',
      'USE WAREHOUSE QUICKSTART_PGCDC_WH;',
      '',
      '-- record-counts: Record counts per table',
      '-- Expected: appointments 170 (150 past + 20 upcoming), doctors 10, patients 100, visits 100 before live activity',
      `SELECT 'patients' AS table_name, COUNT(*) AS record_count FROM QUICKSTART_PGCDC_DB."healthcare"."patients"`,
    ]);
    expect(lines.filter((line) => SECTION_HEADER.test(line))).toHaveLength(18);
    expect(lines[lines.length - 1]).toBe('');
  });

  it('should render every analytics query for the selected profile', async () => {
    env.CDC_METADATA_PROFILE = 'legacy';
    const script = await service.render('analytics');
    const lines = script.split('\n');
    expect(lines[2]).toBe('-- Metadata profile: legacy');
    expect(lines.filter((line) => SECTION_HEADER.test(line))).toHaveLength(24);
    expect(lines).toContain('-- recent-changes: Recent appointment changes');
    expect(script).toContain('_CHANGE_TYPE');
    expect(script).not.toContain('{{');
  });
});
