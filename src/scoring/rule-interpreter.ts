import { clamp, round } from '../common/utils/math.util';
import {
  Facts,
  FactValue,
  RuleCondition,
  RuleScore,
  RuleTable,
  RuleTraceEntry,
} from './interfaces/rule.interface';

const PLACEHOLDER = /\{([\w.]+)\}/g;

function isPresent(value: FactValue | undefined): value is Exclude<FactValue, null> {
  return value !== undefined && value !== null;
}

export function matches(condition: RuleCondition, facts: Facts): boolean {
  if ('all' in condition) {
    return condition.all.every(child => matches(child, facts));
  }
  if ('any' in condition) {
    return condition.any.some(child => matches(child, facts));
  }

  const value = facts[condition.fact];
  switch (condition.op) {
    case 'absent':
      return !isPresent(value);
    case 'present':
      return isPresent(value);
    case 'eq':
      return isPresent(value) ? value === condition.value : condition.value === null;
    case 'neq':
      return isPresent(value) ? value !== condition.value : condition.value !== null;
    case 'between':
      return typeof value === 'number' && value >= condition.min && value <= condition.max;
    case 'gt':
      return typeof value === 'number' && value > condition.value;
    case 'gte':
      return typeof value === 'number' && value >= condition.value;
    case 'lt':
      return typeof value === 'number' && value < condition.value;
    case 'lte':
      return typeof value === 'number' && value <= condition.value;
  }
}

function formatFact(value: FactValue | undefined): string {
  if (!isPresent(value)) {
    return 'n/a';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : String(round(value, 2));
  }
  return String(value);
}

export function renderReason(template: string, facts: Facts): string {
  return template.replace(PLACEHOLDER, (_, fact: string) => formatFact(facts[fact]));
}

/**
 * Applies every matching rule of `table` in order, starting from the table
 * base and clamping to [0, 1] after each step. Rules that match while the
 * score is saturated are still traced, with an applied delta of 0.
 */
export function evaluateRules(table: RuleTable, facts: Facts, category = table.category): RuleScore {
  let score = clamp(table.base);
  const trace: RuleTraceEntry[] = [];
  const positiveFactors: string[] = [];
  const concerns: string[] = [];

  for (const rule of table.rules) {
    if (!matches(rule.when, facts)) {
      continue;
    }

    const next = clamp(score + rule.delta);
    const reason = renderReason(rule.reason, facts);
    trace.push({
      ruleName: rule.name,
      delta: rule.delta,
      appliedDelta: next === score ? 0 : round(next - score, 10),
      reason,
    });
    score = next;

    if (rule.delta > 0) {
      positiveFactors.push(reason);
    } else if (rule.delta < 0) {
      concerns.push(reason);
    }
  }

  return { category, score: round(score, 10), trace, positiveFactors, concerns };
}
