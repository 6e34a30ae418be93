import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import {
  CONTEXTUAL_EVALUATOR,
  ContextualEvaluator,
} from '../contextual/interfaces/contextual.interface';
import { GridStoreService } from '../grid/grid-store.service';
import {
  BUSINESS_SOURCE,
  BusinessSource,
  SOCIAL_SOURCE,
  SocialSource,
} from '../sources/interfaces/source.interface';

interface ServiceStatus {
  name: string;
  status: 'up' | 'down';
  message: string;
}

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly gridStore: GridStoreService,
    @Inject(BUSINESS_SOURCE)
    private readonly businessSource: BusinessSource,
    @Inject(SOCIAL_SOURCE)
    private readonly socialSource: SocialSource,
    @Inject(CONTEXTUAL_EVALUATOR)
    private readonly contextual: ContextualEvaluator,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Service health' })
  check() {
    const regions = this.gridStore.listRegions();
    const grids: ServiceStatus = {
      name: 'grid-store',
      status: regions.length > 0 ? 'up' : 'down',
      message: `${regions.length} region(s) loaded, ${this.gridStore.sweepsInFlight} sweep(s) in flight`,
    };

    return {
      status: grids.status === 'up' ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      services: [
        grids,
        { name: this.businessSource.name, status: 'up', message: 'Business source configured' },
        { name: this.socialSource.name, status: 'up', message: 'Social source configured' },
        { name: this.contextual.name, status: 'up', message: 'Contextual evaluator configured' },
      ],
    };
  }
}
