import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import contextualConfig from '../config/contextual.config';
import scoringConfig from '../config/scoring.config';
import {
  ConfigurationError,
  ContextualEvaluatorError,
  NotFoundError,
  RequestAbortedError,
  UpstreamUnavailableError,
} from '../common/errors';
import { BoundingBox, Coordinate } from '../common/interfaces/geo.interface';
import { BusinessRecord, SocialSignal } from '../common/interfaces/records.interface';
import { errorMessage, errorStack } from '../common/utils/error.util';
import { boundsAround, containsPoint, haversineMeters } from '../common/utils/geo.util';
import { withTimeout } from '../common/utils/timeout.util';
import {
  CONTEXTUAL_EVALUATOR,
  ContextualAssessment,
  ContextualEvaluator,
} from '../contextual/interfaces/contextual.interface';
import { BevGeneratorService, GeneratedEnvironment } from '../environment/bev-generator.service';
import { BusinessEnvironmentVector } from '../environment/interfaces/bev.interface';
import { ExplainabilityService } from '../explainability/explainability.service';
import { Evidence } from '../explainability/interfaces/explanation.interface';
import { GridIndex } from '../grid/grid-index';
import { GridStoreService } from '../grid/grid-store.service';
import { GridCell, RegionSummary } from '../grid/interfaces/grid.interface';
import { PointToGridAssignerService } from '../grid/point-to-grid-assigner.service';
import { CHANNEL_BY_SIGNAL, GridMetrics } from '../metrics/interfaces/metrics.interface';
import { MetricsAggregatorService } from '../metrics/metrics-aggregator.service';
import { NormalizerService } from '../metrics/normalizer.service';
import { RuleScore } from '../scoring/interfaces/rule.interface';
import {
  CategoryScore,
  GridOpportunity,
  ProcessingMode,
} from '../scoring/interfaces/score.interface';
import { OpportunityScorerService } from '../scoring/opportunity-scorer.service';
import { RuleEngineService } from '../scoring/rule-engine.service';
import { ScoreCombinerService } from '../scoring/score-combiner.service';
import {
  BUSINESS_SOURCE,
  BusinessSource,
  SOCIAL_SOURCE,
  SocialSource,
} from '../sources/interfaces/source.interface';
import { gridFacts } from './grid-facts';
import {
  BatchEntry,
  ContextualSummary,
  GridExplanation,
  GridListing,
  PointQuery,
  RankResult,
  Recommendation,
  RequestOptions,
} from './interfaces/recommendation.interface';
import { PipelineRun } from './pipeline-run';

interface RegionData {
  businesses: BusinessRecord[];
  signals: SocialSignal[];
  /** Sources that could not be reached; their data counts as empty. */
  upstreamWarnings: string[];
}

interface GridCandidate {
  cell: GridCell;
  metrics: GridMetrics;
  opportunity: GridOpportunity;
  rule: RuleScore;
  assessment: ContextualAssessment | null;
  degraded: boolean;
  warnings: string[];
}

const EMPTY_EVIDENCE: Evidence = { topPosts: [], competitors: [] };

/**
 * Orchestrates grid sweeps, point evaluations and grid explanations over the
 * grid store, the data sources and the scoring components.
 */
@Injectable()
export class RecommendationPipelineService {
  private readonly logger = new Logger(RecommendationPipelineService.name);

  constructor(
    private readonly gridStore: GridStoreService,
    private readonly assigner: PointToGridAssignerService,
    private readonly aggregator: MetricsAggregatorService,
    private readonly normalizer: NormalizerService,
    private readonly bevGenerator: BevGeneratorService,
    private readonly ruleEngine: RuleEngineService,
    private readonly opportunityScorer: OpportunityScorerService,
    private readonly combiner: ScoreCombinerService,
    private readonly explainer: ExplainabilityService,
    @Inject(BUSINESS_SOURCE)
    private readonly businessSource: BusinessSource,
    @Inject(SOCIAL_SOURCE)
    private readonly socialSource: SocialSource,
    @Inject(CONTEXTUAL_EVALUATOR)
    private readonly contextual: ContextualEvaluator,
    @Inject(scoringConfig.KEY)
    private readonly config: ConfigType<typeof scoringConfig>,
    @Inject(contextualConfig.KEY)
    private readonly contextualSettings: ConfigType<typeof contextualConfig>,
  ) {}

  listRegions(): RegionSummary[] {
    return this.gridStore.listRegions();
  }

  /**
   * Grid sweep: scores every grid of `region` for `category` and returns the
   * best `limit`, ordered by score, then confidence, then grid id.
   */
  async rank(
    region: string,
    category: string,
    limit: number,
    options: RequestOptions = {},
  ): Promise<RankResult> {
    const mode = options.mode ?? 'fast';
    const sweepCategory = this.sweepCategory(category);
    const run = new PipelineRun(mode, options.signal);

    return this.gridStore.withRegion(region, async index => {
      run.enter('Aggregating');
      const data = await this.regionData(index, sweepCategory);
      const raw = this.aggregator.aggregate(
        sweepCategory,
        index.gridIds,
        data.businesses,
        data.signals,
        { windowDays: this.config.signalWindowDays },
      );

      run.enter('Normalizing');
      const { metrics } = this.normalizer.normalizeAll(raw);

      run.enter('RuleScoring');
      const candidates = this.scoreGrids(index, metrics, sweepCategory);

      if (mode === 'full') {
        run.enter('ContextualPending');
        await this.assessGrids(index, candidates, sweepCategory, run, options.signal);
      }

      run.enter('Combining');
      const scored = candidates.map(candidate => ({
        candidate,
        score: this.combiner.combine(candidate.rule, mode, candidate.assessment),
      }));

      run.enter('Explaining');
      const lowConfidence = data.upstreamWarnings.length > 0;
      const recommendations = scored
        .map(({ candidate, score }) =>
          this.explainGrid(index, candidate, score, data, mode, lowConfidence),
        )
        .sort(byRanking)
        .slice(0, Math.max(0, limit));

      const timing = run.finish();
      for (const recommendation of recommendations) {
        recommendation.timing = timing;
      }

      this.logger.log(
        `Ranked ${candidates.length}/${index.size} grid(s) of '${region}' for '${sweepCategory}' ` +
          `(${mode}) in ${timing.totalMs}ms`,
      );

      return {
        region: index.region,
        category: sweepCategory,
        processingMode: mode,
        totalGrids: candidates.length,
        recommendations,
        lowConfidence,
        warnings: data.upstreamWarnings,
        timing,
      };
    });
  }

  /**
   * Point query: rule tables over the BEV of the point, optionally blended
   * with the contextual evaluator.
   */
  async evaluate(query: PointQuery, options: RequestOptions = {}): Promise<Recommendation> {
    const mode = options.mode ?? 'fast';
    const point: Coordinate = { lat: query.lat, lon: query.lon };
    const radiusM = query.radiusM ?? this.config.defaultRadiusM;
    const categories = this.config.pointCategories;
    const run = new PipelineRun(mode, options.signal);
    const upstreamWarnings: string[] = [];
    const warnings: string[] = [];

    run.enter('Aggregating');
    const [environment, signals] = await Promise.all([
      this.generateEnvironment(point, radiusM, upstreamWarnings),
      this.signalsAround(categories, point, radiusM, upstreamWarnings),
    ]);
    const { bev, records } = environment;

    run.enter('RuleScoring');
    const facts = this.bevGenerator.toFacts(bev);
    const rules = categories.map(category => this.ruleEngine.evaluateCategory(category, facts));

    let assessment: ContextualAssessment | null = null;
    if (mode === 'full') {
      run.enter('ContextualPending');
      try {
        assessment = await this.assess(bev, categories, options.signal);
      } catch (error) {
        const warning = `Contextual assessment unavailable: ${errorMessage(error)}`;
        this.logger.warn(warning);
        warnings.push(warning);
      }
    }

    run.enter('Combining');
    const scores = rules.map(rule => this.combiner.combine(rule, mode, assessment));
    const best = this.combiner.best(scores);
    if (!best) {
      throw new ConfigurationError('No point categories are configured');
    }

    run.enter('Explaining');
    const wanted = best.category.toLowerCase();
    const competitors = records.filter(record => record.category.toLowerCase() === wanted);
    const posts = signals.filter(signal => signal.category.toLowerCase() === wanted);
    const instagram = posts.filter(post => CHANNEL_BY_SIGNAL[post.signalType] === 'instagram').length;
    const cell = this.locate(point);

    const recommendation: Omit<Recommendation, 'timing'> = {
      gridId: cell ? cell.id : null,
      region: cell ? cell.region : null,
      point,
      scores: Object.fromEntries(scores.map(score => [score.category, score])),
      bestCategory: best.category,
      opportunityScore: best.score,
      confidence: this.opportunityScorer.confidence(instagram, posts.length - instagram),
      rationale: this.explainer.rationale(best.score, competitors.length, posts.length),
      message: this.combiner.message(best),
      evidence: {
        topPosts: this.explainer.topPosts(signals, null, best.category),
        competitors: this.explainer.topCompetitors(records, point, null, best.category),
      },
      ...(assessment ? { contextual: summarize(assessment) } : {}),
      ...(options.debug ? { environment: bev } : {}),
      processingMode: mode,
      degraded: false,
      lowConfidence: upstreamWarnings.length > 0,
      warnings: [...upstreamWarnings, ...warnings],
    };
    const timing = run.finish();

    this.logger.log(
      `Evaluated (${point.lat}, ${point.lon}) r=${radiusM}m (${mode}): best ${best.category} ` +
        `${best.score.toFixed(4)} in ${timing.totalMs}ms`,
    );
    return { ...recommendation, timing };
  }

  /**
   * Evaluates each location in turn. A failing location becomes an error
   * entry; cancellation stops the whole batch.
   */
  async evaluateBatch(queries: readonly PointQuery[], options: RequestOptions = {}): Promise<BatchEntry[]> {
    const entries: BatchEntry[] = [];

    for (const [index, query] of queries.entries()) {
      try {
        entries.push({ index, query, result: await this.evaluate(query, options), error: null });
      } catch (error) {
        if (error instanceof RequestAbortedError) {
          throw error;
        }
        this.logger.warn(`Batch location #${index} failed: ${errorMessage(error)}`);
        entries.push({ index, query, result: null, error: errorMessage(error) });
      }
    }

    return entries;
  }

  /**
   * Evidence, rationale and level labels for one grid, normalized against
   * the rest of its region.
   */
  async explain(gridId: string, category: string): Promise<GridExplanation> {
    const { index } = this.gridStore.findCell(gridId);
    const sweepCategory = this.sweepCategory(category);

    return this.gridStore.withRegion(index.region, async current => {
      const cell = current.get(gridId);
      if (!cell) {
        throw new NotFoundError('grid', gridId);
      }
      const { data, metrics } = await this.regionMetrics(current, sweepCategory);
      const row = metrics.find(entry => entry.gridId === gridId);
      if (!row) {
        throw new NotFoundError('grid', gridId);
      }

      const { score, confidence } = this.opportunityScorer.assess(row);
      const demand = row.instagramVolume + row.redditMentions;

      return {
        gridId,
        region: current.region,
        category: sweepCategory,
        center: cell.center,
        metrics: row,
        opportunityScore: score,
        confidence,
        rationale: this.explainer.rationale(score, row.businessCount, demand),
        narrative: this.explainer.narrative(score, row.businessCount, demand),
        levels: this.explainer.levels(score, confidence, demand, row.businessCount),
        evidence: {
          topPosts: this.explainer.topPosts(data.signals, gridId, sweepCategory),
          competitors: this.explainer.topCompetitors(
            data.businesses,
            cell.center,
            gridId,
            sweepCategory,
          ),
        },
        lowConfidence: data.upstreamWarnings.length > 0,
        warnings: data.upstreamWarnings,
      };
    });
  }

  /**
   * Per-grid metrics of a region with their opportunity score and confidence,
   * in grid order.
   */
  async listGrids(region: string, category: string): Promise<GridListing> {
    const sweepCategory = this.sweepCategory(category);

    return this.gridStore.withRegion(region, async index => {
      const { data, metrics } = await this.regionMetrics(index, sweepCategory);
      return {
        region: index.region,
        category: sweepCategory,
        grids: metrics.map(row => {
          const { score, confidence } = this.opportunityScorer.assess(row);
          return { ...row, opportunityScore: score, confidence };
        }),
        lowConfidence: data.upstreamWarnings.length > 0,
        warnings: data.upstreamWarnings,
      };
    });
  }

  private sweepCategory(category: string): string {
    const wanted = category.toLowerCase();
    const match = this.config.sweepCategories.find(name => name.toLowerCase() === wanted);
    if (!match) {
      throw new NotFoundError('category', category);
    }
    return match;
  }

  private async regionData(index: GridIndex, category: string): Promise<RegionData> {
    const upstreamWarnings: string[] = [];
    const [businesses, signals] = await Promise.all([
      this.orEmpty(
        this.businessSource.name,
        () => this.businessSource.fetch({ kind: 'bounds', bounds: index.bounds, category }),
        upstreamWarnings,
      ),
      this.orEmpty(
        this.socialSource.name,
        () => this.socialSource.fetch(category, index.bounds, this.config.signalWindowDays),
        upstreamWarnings,
      ),
    ]);

    return {
      businesses: this.assigner.assignAll(businesses, index.cells),
      signals: this.assigner.assignAll(signals, index.cells),
      upstreamWarnings,
    };
  }

  private async regionMetrics(
    index: GridIndex,
    category: string,
  ): Promise<{ data: RegionData; metrics: GridMetrics[] }> {
    const data = await this.regionData(index, category);
    const raw = this.aggregator.aggregate(category, index.gridIds, data.businesses, data.signals, {
      windowDays: this.config.signalWindowDays,
    });
    return { data, metrics: this.normalizer.normalizeAll(raw).metrics };
  }

  /**
   * GOS and grid rule trace per grid. The GOS is the rule score; the table's
   * own score travels beside it as `tableScore`. A grid whose GOS cannot be
   * computed is dropped.
   */
  private scoreGrids(index: GridIndex, metrics: GridMetrics[], category: string): GridCandidate[] {
    const candidates: GridCandidate[] = [];

    for (const row of metrics) {
      const cell = index.get(row.gridId);
      if (!cell) {
        continue;
      }

      let opportunity: GridOpportunity;
      try {
        opportunity = this.opportunityScorer.assess(row);
      } catch (error) {
        this.logger.error(`Grid ${row.gridId} could not be scored: ${errorMessage(error)}`, errorStack(error));
        continue;
      }

      const candidate: GridCandidate = {
        cell,
        metrics: row,
        opportunity,
        rule: { category, score: opportunity.score, trace: [], positiveFactors: [], concerns: [] },
        assessment: null,
        degraded: false,
        warnings: [],
      };
      try {
        const evaluation = this.ruleEngine.evaluateGrid(category, gridFacts(row));
        candidate.rule = { ...evaluation, score: opportunity.score, tableScore: evaluation.score };
      } catch (error) {
        this.degrade(candidate, `Rule trace unavailable: ${errorMessage(error)}`);
      }
      candidates.push(candidate);
    }

    if (candidates.length < metrics.length) {
      this.logger.warn(`Dropped ${metrics.length - candidates.length} grid(s) of '${index.region}'`);
    }
    return candidates;
  }

  /**
   * Full-mode sweeps: contextual assessment of a BEV at every grid centre,
   * in chunks of SWEEP_CONCURRENCY.
   */
  private async assessGrids(
    index: GridIndex,
    candidates: GridCandidate[],
    category: string,
    run: PipelineRun,
    signal?: AbortSignal,
  ): Promise<void> {
    const radiusM = Math.min(this.config.gridContextRadiusM, Math.ceil(1.5 * index.cellSizeM));
    const chunkSize = Math.max(1, this.config.sweepConcurrency);

    for (let start = 0; start < candidates.length; start += chunkSize) {
      run.checkpoint();
      const chunk = candidates.slice(start, start + chunkSize);
      await Promise.all(
        chunk.map(async candidate => {
          try {
            const { bev } = await this.bevGenerator.generate(candidate.cell.center, radiusM);
            candidate.assessment = await this.assess(bev, [category], signal);
          } catch (error) {
            candidate.warnings.push(`Contextual assessment unavailable: ${errorMessage(error)}`);
            this.logger.debug(`Grid ${candidate.cell.id} kept its rule score: ${errorMessage(error)}`);
          }
        }),
      );
    }
  }

  private explainGrid(
    index: GridIndex,
    candidate: GridCandidate,
    score: CategoryScore,
    data: RegionData,
    mode: ProcessingMode,
    lowConfidence: boolean,
  ): Recommendation {
    const { cell, metrics, opportunity } = candidate;

    let evidence = EMPTY_EVIDENCE;
    if (!candidate.degraded) {
      try {
        evidence = {
          topPosts: this.explainer.topPosts(data.signals, cell.id, score.category),
          competitors: this.explainer.topCompetitors(data.businesses, cell.center, cell.id, score.category),
        };
      } catch (error) {
        this.degrade(candidate, `Evidence unavailable: ${errorMessage(error)}`);
      }
    }

    return {
      gridId: cell.id,
      region: index.region,
      point: cell.center,
      scores: { [score.category]: score },
      bestCategory: score.category,
      opportunityScore: opportunity.score,
      confidence: opportunity.confidence,
      rationale: this.explainer.rationale(
        score.score,
        metrics.businessCount,
        metrics.instagramVolume + metrics.redditMentions,
      ),
      message: this.combiner.message(score),
      evidence,
      metrics,
      ...(candidate.assessment ? { contextual: summarize(candidate.assessment) } : {}),
      processingMode: mode,
      degraded: candidate.degraded,
      lowConfidence,
      warnings: candidate.warnings,
      timing: { totalMs: 0, stages: {} },
    };
  }

  private degrade(candidate: GridCandidate, reason: string): void {
    candidate.degraded = true;
    candidate.warnings.push(reason);
    this.logger.warn(`Grid ${candidate.cell.id} degraded: ${reason}`);
  }

  private assess(
    bev: BusinessEnvironmentVector,
    categories: readonly string[],
    signal?: AbortSignal,
  ): Promise<ContextualAssessment> {
    const timeoutMs = this.contextualSettings.timeoutMs;
    return withTimeout(
      taskSignal => this.contextual.assess(bev, categories, taskSignal),
      timeoutMs,
      () => new ContextualEvaluatorError(`Contextual assessment timed out after ${timeoutMs}ms`, true),
      signal,
    );
  }

  private async generateEnvironment(
    point: Coordinate,
    radiusM: number,
    upstreamWarnings: string[],
  ): Promise<GeneratedEnvironment> {
    try {
      return await this.bevGenerator.generate(point, radiusM);
    } catch (error) {
      if (!(error instanceof UpstreamUnavailableError)) {
        throw error;
      }
      this.noteUpstream(error, upstreamWarnings);
      return { bev: this.bevGenerator.build(point, radiusM, []), records: [] };
    }
  }

  private async signalsAround(
    categories: readonly string[],
    point: Coordinate,
    radiusM: number,
    upstreamWarnings: string[],
  ): Promise<SocialSignal[]> {
    const area: BoundingBox = boundsAround(point, radiusM);
    const batches = await Promise.all(
      categories.map(category =>
        this.orEmpty(
          this.socialSource.name,
          () => this.socialSource.fetch(category, area, this.config.signalWindowDays),
          upstreamWarnings,
        ),
      ),
    );

    return batches
      .flat()
      .filter(signal => signal.location && haversineMeters(point, signal.location) <= radiusM);
  }

  private async orEmpty<T>(
    source: string,
    fetch: () => Promise<T[]>,
    upstreamWarnings: string[],
  ): Promise<T[]> {
    try {
      return await fetch();
    } catch (error) {
      if (!(error instanceof UpstreamUnavailableError)) {
        throw error;
      }
      this.noteUpstream(error, upstreamWarnings);
      this.logger.debug(`Continuing without data from ${source}`);
      return [];
    }
  }

  private noteUpstream(error: UpstreamUnavailableError, upstreamWarnings: string[]): void {
    this.logger.warn(error.message);
    if (!upstreamWarnings.includes(error.message)) {
      upstreamWarnings.push(error.message);
    }
  }

  private locate(point: Coordinate): GridCell | null {
    for (const index of this.gridStore.snapshot()) {
      if (containsPoint(index.bounds, point)) {
        return this.assigner.assign(point, index.cells);
      }
    }
    return null;
  }
}

function summarize(assessment: ContextualAssessment): ContextualSummary {
  return {
    model: assessment.model,
    keyFactors: [...assessment.keyFactors],
    risks: [...assessment.risks],
    recommendation: assessment.recommendation ?? null,
  };
}

function byRanking(a: Recommendation, b: Recommendation): number {
  const scoreA = a.scores[a.bestCategory]?.score ?? 0;
  const scoreB = b.scores[b.bestCategory]?.score ?? 0;
  return (
    scoreB - scoreA ||
    b.confidence - a.confidence ||
    (a.gridId ?? '').localeCompare(b.gridId ?? '')
  );
}
