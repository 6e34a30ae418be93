import { Controller, Get, HttpStatus, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RecommendationPipelineService } from '../../recommendation/recommendation-pipeline.service';
import { CategoryQueryDto } from '../dtos/grid.dto';
import { toGridExplanationModel } from '../mappers/response.mapper';
import { GridExplanationModel } from '../models/responses.model';

@ApiTags('Grids')
@Controller('api/grids')
export class GridsController {
  constructor(private readonly pipeline: RecommendationPipelineService) {}

  @Get(':gridId/explain')
  @ApiOperation({
    summary: 'Explain a grid',
    description: 'Evidence, rationale, narrative and level labels for one grid.',
  })
  @ApiParam({ name: 'gridId', example: 'clifton-block2-000-000' })
  @ApiResponse({ status: HttpStatus.OK, type: GridExplanationModel })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Unknown grid or category' })
  async explain(
    @Param('gridId') gridId: string,
    @Query() query: CategoryQueryDto,
  ): Promise<GridExplanationModel> {
    return toGridExplanationModel(await this.pipeline.explain(gridId, query.category));
  }
}
