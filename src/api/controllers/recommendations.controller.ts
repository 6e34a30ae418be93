import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Post, Query, Res } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { RecommendationPipelineService } from '../../recommendation/recommendation-pipeline.service';
import { BatchEvaluateDto, EvaluatePointDto, RankQueryDto } from '../dtos/recommendation.dto';
import {
  toBatchResponse,
  toRankResponse,
  toRecommendationModel,
} from '../mappers/response.mapper';
import {
  BatchResponseModel,
  RankResponseModel,
  RecommendationModel,
} from '../models/responses.model';
import { requestSignal } from '../request-signal';

const DEFAULT_LIMIT = 10;

@ApiTags('Recommendations')
@Controller('api/recommendations')
export class RecommendationsController {
  private readonly logger = new Logger(RecommendationsController.name);

  constructor(private readonly pipeline: RecommendationPipelineService) {}

  @Get()
  @ApiOperation({
    summary: 'Rank grids of a region',
    description:
      'Scores every grid of the region for the category and returns the best ones, ordered by score, confidence and grid id.',
  })
  @ApiResponse({ status: HttpStatus.OK, type: RankResponseModel })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Unknown region or category' })
  async rank(
    @Query() query: RankQueryDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<RankResponseModel> {
    const limit = query.limit ?? DEFAULT_LIMIT;
    this.logger.debug(`Rank ${query.region}/${query.category} limit=${limit} mode=${query.mode ?? 'fast'}`);

    const result = await this.pipeline.rank(query.region, query.category, limit, {
      mode: query.mode,
      signal: requestSignal(res),
    });
    return toRankResponse(result);
  }

  @Post('evaluate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Evaluate a location',
    description: 'Scores every configured category at a point and recommends the best one.',
  })
  @ApiBody({
    type: EvaluatePointDto,
    examples: {
      fast: { summary: 'Rule-based', value: { lat: 24.8138, lon: 67.0311, radius: 1000 } },
      full: {
        summary: 'Blended with the contextual evaluator',
        value: { lat: 24.8138, lon: 67.0311, mode: 'full' },
      },
      debug: {
        summary: 'With the environment vector',
        value: { lat: 24.8138, lon: 67.0311, debug: true },
      },
    },
  })
  @ApiResponse({ status: HttpStatus.OK, type: RecommendationModel })
  async evaluate(
    @Body() body: EvaluatePointDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<RecommendationModel> {
    const recommendation = await this.pipeline.evaluate(
      { lat: body.lat, lon: body.lon, radiusM: body.radius },
      { mode: body.mode, debug: body.debug, signal: requestSignal(res) },
    );
    return toRecommendationModel(recommendation);
  }

  @Post('evaluate/batch')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Evaluate several locations',
    description: 'Evaluates each location in order. A failing location is reported in its entry.',
  })
  @ApiResponse({ status: HttpStatus.OK, type: BatchResponseModel })
  async evaluateBatch(
    @Body() body: BatchEvaluateDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<BatchResponseModel> {
    const entries = await this.pipeline.evaluateBatch(
      body.locations.map(location => ({
        lat: location.lat,
        lon: location.lon,
        radiusM: location.radius,
      })),
      { mode: body.mode, signal: requestSignal(res) },
    );
    return toBatchResponse(entries);
  }
}
