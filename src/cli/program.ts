import { Command, InvalidArgumentError } from 'commander';
import { writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { INTEGRITY_MODES, IntegrityMode, IntegrityService } from '../services/integrity.service';
import { QueryCatalogService } from '../services/query-catalog.service';
import { SchemaService } from '../services/schema.service';
import { SeedService } from '../services/seed.service';
import { SimulationService } from '../services/simulation.service';
import { isScriptKind, SCRIPT_KINDS, WarehouseScriptService } from '../services/warehouse-script.service';

/** The services each command needs, resolved lazily so `--help` never boots the application. */
export interface CliServices {
  schema: Pick<SchemaService, 'initialize' | 'readiness'>;
  seed: Pick<SeedService, 'seed'>;
  simulation: Pick<SimulationService, 'run'>;
  integrity: Pick<IntegrityService, 'verify'>;
  scripts: Pick<WarehouseScriptService, 'render'>;
  queries: Pick<QueryCatalogService, 'list'>;
}

export interface CliOutput {
  write(text: string): void;
  writeFile(file: string, text: string): Promise<void>;
}

export const processOutput: CliOutput = {
  write: (text) => {
    process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  },
  writeFile: (file, text) => writeFile(file, text, 'utf8'),
};

/** Raised when a command ran but its outcome must fail the process. */
export class CliFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliFailure';
  }
}

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parseInt(value, 10);
}

function parsePace(value: string): number {
  const pace = Number(value);
  if (value.trim() === '' || !Number.isFinite(pace) || pace < 0) {
    throw new InvalidArgumentError('Expected a number >= 0.');
  }
  return pace;
}

function parseMode(value: string): IntegrityMode {
  const mode = INTEGRITY_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new InvalidArgumentError(`Expected one of ${INTEGRITY_MODES.join(', ')}.`);
  }
  return mode;
}

export function createProgram(loadServices: () => Promise<CliServices>, output: CliOutput = processOutput): Command {
  const printJson = (value: unknown) => output.write(JSON.stringify(value, null, 2));

  const program = new Command()
    .name('clinic-cdc')
    .description('PostgreSQL to Snowflake CDC demo kit for a clinic appointment workload')
    .version('1.0.0', '-v, --version', 'Show version number')
    .option('--quiet', 'Only log warnings and errors')
    .exitOverride();

  const source = program.command('source').description('Provision and populate the PostgreSQL source');

  source
    .command('init')
    .description('Grant replication, recreate the schema and tables, and create the publication')
    .action(async () => {
      const { schema } = await loadServices();
      printJson(await schema.initialize());
    });

  source
    .command('status')
    .description('Report wal_level and publication coverage')
    .action(async () => {
      const { schema } = await loadServices();
      printJson(await schema.readiness());
    });

  source
    .command('seed')
    .description('Load the synthetic snapshot into empty source tables')
    .option('--seed <n>', 'PRNG seed', parseInteger)
    .action(async (options: { seed?: number }) => {
      const { seed } = await loadServices();
      printJson(await seed.seed({ seed: options.seed }));
    });

  program
    .command('setup')
    .description('Run "source init" followed by "source seed"')
    .option('--seed <n>', 'PRNG seed', parseInteger)
    .action(async (options: { seed?: number }) => {
      const services = await loadServices();
      const readiness = await services.schema.initialize();
      const seed = await services.seed.seed({ seed: options.seed });
      printJson({ readiness, seed });
    });

  program
    .command('simulate')
    .description('Run a live-activity scenario against the source')
    .option('--scenario <name|file.json>', 'Bundled scenario name or path to a scenario file')
    .option('--pace <n>', 'Multiplier on scenario pauses; 0 disables them', parsePace)
    .action(async (options: { scenario?: string; pace?: number }) => {
      const { simulation } = await loadServices();
      printJson(await simulation.run({ scenario: options.scenario, pace: options.pace }));
    });

  program
    .command('verify')
    .description('Run the data-integrity checks against the source')
    .option('--mode <mode>', `One of ${INTEGRITY_MODES.join(', ')}`, parseMode, 'snapshot')
    .action(async (options: { mode: IntegrityMode }) => {
      const { integrity } = await loadServices();
      const report = await integrity.verify(options.mode);
      printJson(report);
      if (!report.passed) {
        const failed = report.checks.filter((check) => !check.passed).length;
        throw new CliFailure(`${failed} of ${report.checks.length} integrity checks failed`);
      }
    });

  const warehouse = program.command('warehouse').description('Render Snowflake scripts and queries');

  warehouse
    .command('render')
    .description(`Render a warehouse script (${SCRIPT_KINDS.join(', ')})`)
    .argument('<kind>', 'Script kind', (value: string) => {
      if (!isScriptKind(value)) {
        throw new InvalidArgumentError(`Expected one of ${SCRIPT_KINDS.join(', ')}.`);
      }
      return value;
    })
    .option('--out <file>', 'Write the script to a file instead of stdout')
    .action(async (kind: (typeof SCRIPT_KINDS)[number], options: { out?: string }) => {
      const { scripts } = await loadServices();
      const sql = await scripts.render(kind);
      if (options.out) {
        const file = path.resolve(options.out);
        await output.writeFile(file, sql);
        output.write(`Wrote ${kind} script to ${file}`);
      } else {
        output.write(sql);
      }
    });

  warehouse
    .command('queries')
    .description('List the warehouse query library')
    .action(async () => {
      const { queries } = await loadServices();
      const catalog = await queries.list();
      printJson(catalog.map(({ id, title, script, order, source }) => ({ id, title, script, order, source })));
    });

  return program;
}
