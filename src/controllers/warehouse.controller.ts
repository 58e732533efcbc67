import { Controller, Get, Header, Logger, NotFoundException, Param } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiProduces, ApiResponse, ApiTags } from '@nestjs/swagger';
import { QueryCatalogService, WarehouseQuery } from '../services/query-catalog.service';
import { isScriptKind, SCRIPT_KINDS, WarehouseScriptService } from '../services/warehouse-script.service';
import { toHttpError } from './http-errors';

export type WarehouseQuerySummary = Omit<WarehouseQuery, 'body'>;

@ApiTags('warehouse')
@Controller('warehouse')
export class WarehouseController {
  private readonly logger = new Logger(WarehouseController.name);

  constructor(
    private readonly warehouseScriptService: WarehouseScriptService,
    private readonly queryCatalogService: QueryCatalogService,
  ) {}

  @Get('scripts/:kind')
  @Header('Content-Type', 'text/plain; charset=utf-8')
  @ApiOperation({ summary: 'Render a warehouse SQL script' })
  @ApiParam({ name: 'kind', enum: SCRIPT_KINDS })
  @ApiProduces('text/plain')
  @ApiResponse({ status: 404, description: 'Unknown script kind' })
  async renderScript(@Param('kind') kind: string): Promise<string> {
    if (!isScriptKind(kind)) {
      throw new NotFoundException(`Unknown script kind "${kind}"; expected one of ${SCRIPT_KINDS.join(', ')}`);
    }
    this.logger.log(`Rendering ${kind} script`);
    try {
      return await this.warehouseScriptService.render(kind);
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Get('queries')
  @ApiOperation({ summary: 'List the warehouse query library for the configured metadata profile' })
  async listQueries(): Promise<WarehouseQuerySummary[]> {
    try {
      const queries = await this.queryCatalogService.list();
      return queries.map(({ body: _body, ...summary }) => summary);
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Get('queries/:id')
  @Header('Content-Type', 'text/plain; charset=utf-8')
  @ApiOperation({ summary: 'Render one warehouse query' })
  @ApiProduces('text/plain')
  @ApiResponse({ status: 404, description: 'Unknown query id' })
  async renderQuery(@Param('id') id: string): Promise<string> {
    try {
      const query = await this.queryCatalogService.get(id);
      return this.queryCatalogService.render(query);
    } catch (error) {
      throw toHttpError(error);
    }
  }
}
