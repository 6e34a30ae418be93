export type FactValue = number | string | boolean | null;

/** Flat, dot-keyed view of a BEV or grid metrics row. */
export type Facts = Readonly<Record<string, FactValue | undefined>>;

export type NumericOperator = 'gt' | 'gte' | 'lt' | 'lte';
export type EqualityOperator = 'eq' | 'neq';
export type PresenceOperator = 'absent' | 'present';

export interface NumericCondition {
  fact: string;
  op: NumericOperator;
  value: number;
}

export interface EqualityCondition {
  fact: string;
  op: EqualityOperator;
  value: FactValue;
}

/** Inclusive on both ends. */
export interface RangeCondition {
  fact: string;
  op: 'between';
  min: number;
  max: number;
}

export interface PresenceCondition {
  fact: string;
  op: PresenceOperator;
}

export interface AllCondition {
  all: RuleCondition[];
}

export interface AnyCondition {
  any: RuleCondition[];
}

export type RuleCondition =
  | NumericCondition
  | EqualityCondition
  | RangeCondition
  | PresenceCondition
  | AllCondition
  | AnyCondition;

export interface RuleDefinition {
  name: string;
  when: RuleCondition;
  delta: number;
  /** May reference facts as `{fact.name}`. */
  reason: string;
}

export interface RuleTable {
  name: string;
  /** Category the table scores, `*` for category-independent tables. */
  category: string;
  base: number;
  rules: readonly RuleDefinition[];
}

export interface RuleTraceEntry {
  ruleName: string;
  delta: number;
  /** Change actually applied after clamping; 0 once the score is saturated. */
  appliedDelta: number;
  reason: string;
}

export interface RuleScore {
  category: string;
  score: number;
  /** What the table reached on its own, when `score` comes from elsewhere. */
  tableScore?: number;
  trace: RuleTraceEntry[];
  positiveFactors: string[];
  concerns: string[];
}
