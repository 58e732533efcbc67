import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KitConfig, WarehouseConfig } from '../config/configuration';
import { assertIdentifier, quoteLiteral } from '../utils/sql-identifiers';

export interface ProvisioningStep {
  title: string;
  statements: string[];
}

export interface SourceEndpoint {
  host: string;
  port: number;
}

const ENDPOINT = /^([A-Za-z0-9.-]+):(\d+)$/;
const LOOPBACK_HOSTS = ['localhost', '127.0.0.1'];

export function parseEndpoint(endpoint: string): SourceEndpoint {
  const match = ENDPOINT.exec(endpoint);
  const port = match ? parseInt(match[2], 10) : NaN;
  if (!match || port < 1 || port > 65535) {
    throw new Error(`Invalid source endpoint "${endpoint}": expected host:port with a port between 1 and 65535`);
  }
  return { host: match[1], port };
}

@Injectable()
export class ProvisioningService {
  private readonly logger = new Logger(ProvisioningService.name);

  constructor(private readonly configService: ConfigService<KitConfig, true>) {}

  plan(): ProvisioningStep[] {
    const config = this.configService.get('warehouse', { infer: true });
    const id = (value: string, label: string) => assertIdentifier(value, label);

    const admin = id(config.adminRole, 'admin role');
    const runtime = id(config.runtimeRole, 'runtime role');
    const connectorAdmin = id(config.connectorAdminRole, 'connector admin role');
    const database = id(config.database, 'database');
    const warehouse = id(config.warehouse, 'warehouse');
    const networkSchema = `${database}.${id(config.networkSchema, 'network schema')}`;
    const networkRule = `${networkSchema}.${id(config.networkRule, 'network rule')}`;
    const integration = id(config.accessIntegration, 'access integration');
    const stage = id(config.stage, 'stage');

    const endpoint = parseEndpoint(config.sourceEndpoint);
    if (LOOPBACK_HOSTS.includes(endpoint.host)) {
      this.logger.warn(
        `Source endpoint ${config.sourceEndpoint} is a loopback address; the connector runs in the warehouse ` +
          'and cannot reach it. Set WAREHOUSE_SOURCE_ENDPOINT to a routable host.',
      );
    }

    const steps: ProvisioningStep[] = [
      {
        title: 'Create role, database and warehouse',
        statements: [
          `USE ROLE ${admin}`,
          `CREATE ROLE IF NOT EXISTS ${runtime}`,
          `CREATE DATABASE IF NOT EXISTS ${database}`,
          `CREATE WAREHOUSE IF NOT EXISTS ${warehouse}\n  WAREHOUSE_SIZE = ${config.warehouseSize}\n  AUTO_SUSPEND = ${config.autoSuspendSeconds}\n  AUTO_RESUME = TRUE`,
          `GRANT OWNERSHIP ON DATABASE ${database} TO ROLE ${runtime}`,
          `GRANT OWNERSHIP ON SCHEMA ${database}.PUBLIC TO ROLE ${runtime}`,
          `GRANT USAGE ON WAREHOUSE ${warehouse} TO ROLE ${runtime}`,
          `GRANT ROLE ${runtime} TO ROLE ${connectorAdmin}`,
        ],
      },
      {
        title: 'Create network schema and semantic model stage',
        statements: [
          `USE ROLE ${runtime}`,
          `USE DATABASE ${database}`,
          `CREATE SCHEMA IF NOT EXISTS ${networkSchema}`,
          'USE SCHEMA PUBLIC',
          `CREATE STAGE IF NOT EXISTS ${stage}\n  DIRECTORY = (ENABLE = TRUE)\n  COMMENT = ${quoteLiteral('Stage for semantic models')}`,
          `GRANT READ ON STAGE ${stage} TO ROLE ${admin}`,
        ],
      },
      {
        title: 'Create network rule for the source endpoint',
        statements: [
          `CREATE OR REPLACE NETWORK RULE ${networkRule}\n  MODE = EGRESS\n  TYPE = HOST_PORT\n  VALUE_LIST = (${quoteLiteral(`${endpoint.host}:${endpoint.port}`)})`,
        ],
      },
      {
        title: 'Create external access integration',
        statements: [
          `USE ROLE ${admin}`,
          `CREATE OR REPLACE EXTERNAL ACCESS INTEGRATION ${integration}\n  ALLOWED_NETWORK_RULES = (${networkRule})\n  ENABLED = TRUE\n  COMMENT = ${quoteLiteral('Connector runtime access for PostgreSQL CDC')}`,
          `GRANT USAGE ON INTEGRATION ${integration} TO ROLE ${runtime}`,
        ],
      },
    ];

    if (config.intelligence.enabled) {
      steps.push(this.intelligenceStep(config, runtime));
    }

    steps.push({
      title: 'Verify setup',
      statements: [
        `USE ROLE ${runtime}`,
        `SHOW ROLES LIKE ${quoteLiteral(runtime)}`,
        `SHOW GRANTS TO ROLE ${runtime}`,
        `SHOW SCHEMAS IN DATABASE ${database}`,
        `SHOW INTEGRATIONS LIKE ${quoteLiteral(integration)}`,
        `DESC INTEGRATION ${integration}`,
      ],
    });

    return steps;
  }

  private intelligenceStep(config: WarehouseConfig, runtime: string): ProvisioningStep {
    const database = assertIdentifier(config.intelligence.database, 'intelligence database');
    return {
      title: 'Set up the intelligence database and agents schema',
      statements: [
        `CREATE DATABASE IF NOT EXISTS ${database}`,
        `GRANT USAGE ON DATABASE ${database} TO ROLE PUBLIC`,
        `CREATE SCHEMA IF NOT EXISTS ${database}.agents`,
        `GRANT USAGE ON SCHEMA ${database}.agents TO ROLE PUBLIC`,
        `GRANT CREATE AGENT ON SCHEMA ${database}.agents TO ROLE ${runtime}`,
      ],
    };
  }

  render(): string {
    const steps = this.plan();
    const sections = steps.map((step, index) => {
      const header = `-- Step ${index + 1}: ${step.title}\n-- ${'-'.repeat(76)}`;
      return [header, ...step.statements.map((statement) => `${statement};`)].join('\n');
    });
    return [
      '-- Warehouse provisioning for the clinic CDC demo',
      '-- Run before configuring the CDC connector.',
      '',
      sections.join('\n\n'),
      '',
    ].join('\n');
  }
}
