import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import scoringConfig from '../config/scoring.config';
import { ConfigurationError, NotFoundError } from '../common/errors';
import { Facts, RuleScore, RuleTable } from './interfaces/rule.interface';
import { evaluateRules } from './rule-interpreter';
import { loadRuleTables } from './rule-table.parser';

/**
 * Holds the rule tables loaded at startup and evaluates facts against them.
 * Tables are immutable once loaded.
 */
@Injectable()
export class RuleEngineService implements OnModuleInit {
  private readonly logger = new Logger(RuleEngineService.name);
  private tables: ReadonlyMap<string, RuleTable> = new Map();

  constructor(
    @Inject(scoringConfig.KEY)
    private readonly config: ConfigType<typeof scoringConfig>,
  ) {}

  onModuleInit(): void {
    this.useTables(loadRuleTables(this.config.rulesDir));
  }

  /**
   * Installs `tables` after checking every configured category has one.
   */
  useTables(tables: ReadonlyMap<string, RuleTable>): void {
    const required = [...this.config.pointCategories, this.config.gridRuleTable];
    const missing = required.filter(name => !tables.has(name));
    if (missing.length > 0) {
      throw new ConfigurationError(`Missing rule table(s): ${missing.join(', ')}`);
    }

    this.tables = new Map(tables);
    this.logger.log(
      `Loaded ${tables.size} rule table(s): ${[...tables.values()]
        .map(table => `${table.name} (${table.rules.length} rules)`)
        .join(', ')}`,
    );
  }

  get tableNames(): string[] {
    return [...this.tables.keys()];
  }

  getTable(name: string): RuleTable {
    const table = this.tables.get(name);
    if (!table) {
      throw new NotFoundError('category', name);
    }
    return table;
  }

  /**
   * Scores a point for `category` using the table of the same name.
   */
  evaluateCategory(category: string, facts: Facts): RuleScore {
    return this.evaluate(this.getTable(category), facts, category);
  }

  /**
   * Evaluates the grid table; the result is reported under `category`.
   */
  evaluateGrid(category: string, facts: Facts): RuleScore {
    return this.evaluate(this.getTable(this.config.gridRuleTable), facts, category);
  }

  evaluate(table: RuleTable, facts: Facts, category = table.category): RuleScore {
    const result = evaluateRules(table, facts, category);
    this.logger.debug(
      `Table '${table.name}' for '${category}': ${result.trace.length} rule(s) fired, score ${result.score}`,
    );
    return result;
  }
}
