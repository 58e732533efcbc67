export type MetadataProfile = 'openflow' | 'legacy';

export const METADATA_PROFILES: readonly MetadataProfile[] = ['openflow', 'legacy'];

export const WAREHOUSE_SIZES = ['XSMALL', 'SMALL', 'MEDIUM', 'LARGE', 'XLARGE'] as const;

export type WarehouseSize = (typeof WAREHOUSE_SIZES)[number];

export interface SourceConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  schema: string;
  ssl: boolean;
  /** Verify the server certificate when `ssl` is on. */
  sslRejectUnauthorized: boolean;
  publication: string;
  replicationUser: string;
  connectOnStartup: boolean;
}

export interface WarehouseConfig {
  adminRole: string;
  runtimeRole: string;
  connectorAdminRole: string;
  database: string;
  warehouse: string;
  warehouseSize: WarehouseSize;
  autoSuspendSeconds: number;
  networkSchema: string;
  networkRule: string;
  sourceEndpoint: string;
  accessIntegration: string;
  stage: string;
  intelligence: {
    enabled: boolean;
    database: string;
  };
  destinationSchema: string;
  metadataProfile: MetadataProfile;
}

export interface SeedConfig {
  randomSeed: number;
}

export interface SimulationConfig {
  pace: number;
  scenario: string;
}

export interface KitConfig {
  port: number;
  source: SourceConfig;
  warehouse: WarehouseConfig;
  seed: SeedConfig;
  simulation: SimulationConfig;
}

type Env = Record<string, string | undefined>;

function text(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined || value.trim() === '' ? fallback : value.trim();
}

function integer(env: Env, key: string, fallback: number): number {
  const value = env[key];
  return value === undefined || value.trim() === '' ? fallback : parseInt(value, 10);
}

function decimal(env: Env, key: string, fallback: number): number {
  const value = env[key];
  return value === undefined || value.trim() === '' ? fallback : parseFloat(value);
}

function flag(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key];
  return value === undefined || value.trim() === '' ? fallback : value.trim().toLowerCase() === 'true';
}

function isMetadataProfile(value: string): value is MetadataProfile {
  return METADATA_PROFILES.some((profile) => profile === value);
}

function isWarehouseSize(value: string): value is WarehouseSize {
  return WAREHOUSE_SIZES.some((size) => size === value);
}

export function loadKitConfig(env: Env): KitConfig {
  const host = text(env, 'SOURCE_DB_HOST', 'localhost');
  const port = integer(env, 'SOURCE_DB_PORT', 5432);
  const username = text(env, 'SOURCE_DB_USERNAME', 'postgres');
  const schema = text(env, 'SOURCE_DB_SCHEMA', 'healthcare');
  const profile = text(env, 'CDC_METADATA_PROFILE', 'openflow');
  const size = text(env, 'WAREHOUSE_SIZE', 'MEDIUM').toUpperCase();

  return {
    port: integer(env, 'PORT', 3000),
    source: {
      host,
      port,
      username,
      password: text(env, 'SOURCE_DB_PASSWORD', 'postgres'),
      database: text(env, 'SOURCE_DB_NAME', 'postgres'),
      schema,
      ssl: flag(env, 'SOURCE_DB_SSL', false),
      sslRejectUnauthorized: flag(env, 'SOURCE_DB_SSL_REJECT_UNAUTHORIZED', true),
      publication: text(env, 'SOURCE_PUBLICATION', 'healthcare_cdc_publication'),
      replicationUser: text(env, 'SOURCE_REPLICATION_USER', username),
      connectOnStartup: flag(env, 'SHOULD_CONNECT_DB', false),
    },
    warehouse: {
      adminRole: text(env, 'WAREHOUSE_ADMIN_ROLE', 'ACCOUNTADMIN'),
      runtimeRole: text(env, 'WAREHOUSE_RUNTIME_ROLE', 'QUICKSTART_ROLE'),
      connectorAdminRole: text(env, 'WAREHOUSE_CONNECTOR_ADMIN_ROLE', 'OPENFLOW_ADMIN'),
      database: text(env, 'WAREHOUSE_DATABASE', 'QUICKSTART_PGCDC_DB'),
      warehouse: text(env, 'WAREHOUSE_NAME', 'QUICKSTART_PGCDC_WH'),
      warehouseSize: isWarehouseSize(size) ? size : 'MEDIUM',
      autoSuspendSeconds: integer(env, 'WAREHOUSE_AUTO_SUSPEND', 300),
      networkSchema: text(env, 'WAREHOUSE_NETWORK_SCHEMA', 'NETWORKS'),
      networkRule: text(env, 'WAREHOUSE_NETWORK_RULE', 'postgres_network_rule'),
      sourceEndpoint: text(env, 'WAREHOUSE_SOURCE_ENDPOINT', `${host}:${port}`),
      accessIntegration: text(env, 'WAREHOUSE_ACCESS_INTEGRATION', 'quickstart_pgcdc_access'),
      stage: text(env, 'WAREHOUSE_STAGE', 'semantic_models'),
      intelligence: {
        enabled: flag(env, 'WAREHOUSE_INTELLIGENCE', true),
        database: text(env, 'WAREHOUSE_INTELLIGENCE_DATABASE', 'snowflake_intelligence'),
      },
      destinationSchema: text(env, 'WAREHOUSE_DESTINATION_SCHEMA', schema),
      metadataProfile: isMetadataProfile(profile) ? profile : 'openflow',
    },
    seed: {
      randomSeed: integer(env, 'SEED_RANDOM_SEED', 1),
    },
    simulation: {
      pace: decimal(env, 'SIMULATION_PACE', 1),
      scenario: text(env, 'SIMULATION_SCENARIO', 'clinic-morning'),
    },
  };
}

export default (): KitConfig => loadKitConfig(process.env);
