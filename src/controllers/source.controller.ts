import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Query,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SeedRequestDto } from '../dto/seed-request.dto';
import { SimulationRequestDto } from '../dto/simulation-request.dto';
import { INTEGRITY_MODES, IntegrityMode, IntegrityReport, IntegrityService } from '../services/integrity.service';
import { ReadinessReport, SchemaService } from '../services/schema.service';
import { SeedService, SeedSummary } from '../services/seed.service';
import { SimulationReport, SimulationService } from '../services/simulation.service';
import { transformAndValidate } from '../utils/validation';
import { toHttpError } from './http-errors';

function isIntegrityMode(value: string): value is IntegrityMode {
  return INTEGRITY_MODES.some((mode) => mode === value);
}

@ApiTags('source')
@Controller('source')
export class SourceController {
  private readonly logger = new Logger(SourceController.name);

  constructor(
    private readonly schemaService: SchemaService,
    private readonly seedService: SeedService,
    private readonly simulationService: SimulationService,
    private readonly integrityService: IntegrityService,
  ) {}

  @Post('schema')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Recreate the source schema, tables and publication' })
  @ApiResponse({ status: 200, description: 'Replication readiness after initialization' })
  async initializeSchema(): Promise<ReadinessReport> {
    this.logger.log('Initializing source schema');
    return this.schemaService.initialize();
  }

  @Get('readiness')
  @ApiOperation({ summary: 'Report wal_level and publication coverage' })
  async readiness(): Promise<ReadinessReport> {
    return this.schemaService.readiness();
  }

  @Post('seed')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Load the synthetic snapshot into empty source tables' })
  @ApiBody({ type: SeedRequestDto, required: false })
  @ApiResponse({ status: 201, description: 'Seed summary' })
  @ApiResponse({ status: 409, description: 'Source tables already hold data' })
  async seed(@Body() body: unknown): Promise<SeedSummary> {
    const { value, errors } = await transformAndValidate(SeedRequestDto, body);
    if (errors.length > 0) {
      this.logger.warn(`Seed request rejected: ${errors.join('; ')}`);
      throw new BadRequestException(errors);
    }

    try {
      return await this.seedService.seed({ seed: value.seed });
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Post('simulation')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Run a live-activity scenario against the source' })
  @ApiBody({ type: SimulationRequestDto, required: false })
  @ApiResponse({ status: 200, description: 'Simulation report' })
  async simulate(@Body() body: unknown): Promise<SimulationReport> {
    const { value, errors } = await transformAndValidate(SimulationRequestDto, body);
    if (errors.length > 0) {
      this.logger.warn(`Simulation request rejected: ${errors.join('; ')}`);
      throw new BadRequestException(errors);
    }

    try {
      return await this.simulationService.run({ scenario: value.scenario, pace: value.pace });
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Get('integrity')
  @ApiOperation({ summary: 'Run the data-integrity checks against the source' })
  @ApiQuery({ name: 'mode', enum: INTEGRITY_MODES, required: false })
  async integrity(@Query('mode') mode?: string): Promise<IntegrityReport> {
    const requested = mode ?? 'snapshot';
    if (!isIntegrityMode(requested)) {
      throw new BadRequestException(`mode must be one of ${INTEGRITY_MODES.join(', ')}`);
    }
    return this.integrityService.verify(requested);
  }
}
