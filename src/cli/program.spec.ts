import { CommanderError } from 'commander';
import * as path from 'node:path';
import { CliFailure, CliServices, createProgram } from './program';

describe('clinic-cdc program', () => {
  const services = {
    schema: { initialize: jest.fn(), readiness: jest.fn() },
    seed: { seed: jest.fn() },
    simulation: { run: jest.fn() },
    integrity: { verify: jest.fn() },
    scripts: { render: jest.fn() },
    queries: { list: jest.fn() },
  };
  const loadServices = jest.fn(async (): Promise<CliServices> => services);
  const output = {
    write: jest.fn(),
    writeFile: jest.fn().mockResolvedValue(undefined),
  };

  const run = (...args: string[]) => createProgram(loadServices, output).parseAsync(['node', 'clinic-cdc', ...args]);
  const printed = (): unknown => JSON.parse(output.write.mock.calls[0][0]);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should print the readiness report after source init', async () => {
    services.schema.initialize.mockResolvedValue({ ready: true });
    await run('source', 'init');
    expect(output.write).toHaveBeenCalledWith(JSON.stringify({ ready: true }, null, 2));
  });

  it('should report source status', async () => {
    services.schema.readiness.mockResolvedValue({ ready: false, walLevel: 'replica' });
    await run('--quiet', 'source', 'status');
    expect(printed()).toEqual({ ready: false, walLevel: 'replica' });
  });

  it('should pass an explicit seed to source seed', async () => {
    services.seed.seed.mockResolvedValue({ seed: 42 });
    await run('source', 'seed', '--seed', '42');
    expect(services.seed.seed).toHaveBeenCalledWith({ seed: 42 });
  });

  it('should leave the seed to the configuration when omitted', async () => {
    services.seed.seed.mockResolvedValue({ seed: 1 });
    await run('source', 'seed');
    expect(services.seed.seed).toHaveBeenCalledWith({ seed: undefined });
  });

  it('should reject a seed that is not a non-negative integer', async () => {
    await expect(run('source', 'seed', '--seed', 'abc')).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
    expect(loadServices).not.toHaveBeenCalled();
  });

  it('should initialize then seed during setup', async () => {
    services.schema.initialize.mockResolvedValue({ ready: true });
    services.seed.seed.mockResolvedValue({ seed: 3 });
    await run('setup', '--seed', '3');
    expect(services.schema.initialize.mock.invocationCallOrder[0]).toBeLessThan(
      services.seed.seed.mock.invocationCallOrder[0],
    );
    expect(printed()).toEqual({ readiness: { ready: true }, seed: { seed: 3 } });
  });

  it('should run a scenario with the given pace', async () => {
    services.simulation.run.mockResolvedValue({ runId: 'run-1' });
    await run('simulate', '--scenario', 'clinic-morning', '--pace', '0.25');
    expect(services.simulation.run).toHaveBeenCalledWith({ scenario: 'clinic-morning', pace: 0.25 });
  });

  it('should reject a pace that is not a number', async () => {
    await expect(run('simulate', '--pace', 'fast')).rejects.toBeInstanceOf(CommanderError);
    expect(services.simulation.run).not.toHaveBeenCalled();
  });

  describe('verify', () => {
    it('should default to snapshot mode', async () => {
      services.integrity.verify.mockResolvedValue({ mode: 'snapshot', passed: true, checks: [] });
      await run('verify');
      expect(services.integrity.verify).toHaveBeenCalledWith('snapshot');
    });

    it('should print the report and fail when checks fail', async () => {
      const report = {
        mode: 'live',
        passed: false,
        checks: [
          { name: 'row-count:patients', passed: false },
          { name: 'row-count:doctors', passed: true },
          { name: 'visit:one-per-appointment', passed: false },
        ],
      };
      services.integrity.verify.mockResolvedValue(report);
      await expect(run('verify', '--mode', 'live')).rejects.toThrow(
        new CliFailure('2 of 3 integrity checks failed'),
      );
      expect(printed()).toEqual(report);
    });

    it('should reject an unknown mode', async () => {
      await expect(run('verify', '--mode', 'strict')).rejects.toMatchObject({ code: 'commander.invalidArgument' });
    });
  });

  describe('warehouse', () => {
    it('should print a rendered script', async () => {
      services.scripts.render.mockResolvedValue('USE ROLE QUICKSTART_ROLE;\n');
      await run('warehouse', 'render', 'analytics');
      expect(services.scripts.render).toHaveBeenCalledWith('analytics');
      expect(output.write).toHaveBeenCalledWith('USE ROLE QUICKSTART_ROLE;\n');
    });

    it('should write a rendered script to a file', async () => {
      services.scripts.render.mockResolvedValue('-- provisioning\n');
      await run('warehouse', 'render', 'provision', '--out', 'build/provision.sql');
      const file = path.resolve('build/provision.sql');
      expect(output.writeFile).toHaveBeenCalledWith(file, '-- provisioning\n');
      expect(output.write).toHaveBeenCalledWith(`Wrote provision script to ${file}`);
    });

    it('should reject an unknown script kind', async () => {
      await expect(run('warehouse', 'render', 'teardown')).rejects.toMatchObject({
        code: 'commander.invalidArgument',
      });
      expect(services.scripts.render).not.toHaveBeenCalled();
    });

    it('should list queries without their bodies', async () => {
      services.queries.list.mockResolvedValue([
        { id: 'record-counts', title: 'Record counts per table', script: 'verify', order: 10, source: 'common', body: 'SELECT 1' },
      ]);
      await run('warehouse', 'queries');
      expect(printed()).toEqual([
        { id: 'record-counts', title: 'Record counts per table', script: 'verify', order: 10, source: 'common' },
      ]);
    });
  });
});
