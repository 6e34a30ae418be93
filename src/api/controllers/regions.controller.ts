import { Controller, Get, HttpStatus, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RecommendationPipelineService } from '../../recommendation/recommendation-pipeline.service';
import { CategoryQueryDto } from '../dtos/grid.dto';
import { toGridListingModel, toRegionModel } from '../mappers/response.mapper';
import { GridListingModel, RegionListModel } from '../models/responses.model';

@ApiTags('Regions')
@Controller('api/regions')
export class RegionsController {
  constructor(private readonly pipeline: RecommendationPipelineService) {}

  @Get()
  @ApiOperation({ summary: 'List configured regions' })
  @ApiResponse({ status: HttpStatus.OK, type: RegionListModel })
  listRegions(): RegionListModel {
    return { regions: this.pipeline.listRegions().map(toRegionModel) };
  }

  @Get(':region/grids')
  @ApiOperation({
    summary: 'List grid metrics',
    description: 'Per-grid counts, normalized metrics, opportunity score and confidence.',
  })
  @ApiParam({ name: 'region', example: 'clifton-block2' })
  @ApiResponse({ status: HttpStatus.OK, type: GridListingModel })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Unknown region or category' })
  async listGrids(
    @Param('region') region: string,
    @Query() query: CategoryQueryDto,
  ): Promise<GridListingModel> {
    return toGridListingModel(await this.pipeline.listGrids(region, query.category));
  }
}
