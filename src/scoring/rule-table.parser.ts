import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from '../common/errors';
import { errorMessage } from '../common/utils/error.util';
import { isFiniteNumber, isRecord, readJsonFile } from '../common/utils/json.util';
import {
  FactValue,
  RuleCondition,
  RuleDefinition,
  RuleTable,
} from './interfaces/rule.interface';

const NUMERIC_OPS = ['gt', 'gte', 'lt', 'lte'] as const;
const EQUALITY_OPS = ['eq', 'neq'] as const;
const PRESENCE_OPS = ['absent', 'present'] as const;

function includes<T extends string>(list: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && (list as readonly string[]).includes(value);
}

function isFactValue(value: unknown): value is FactValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    isFiniteNumber(value)
  );
}

export function parseCondition(raw: unknown, where: string): RuleCondition {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${where}: condition must be an object`);
  }

  if (Array.isArray(raw.all)) {
    return { all: raw.all.map((child, i) => parseCondition(child, `${where}.all[${i}]`)) };
  }
  if (Array.isArray(raw.any)) {
    return { any: raw.any.map((child, i) => parseCondition(child, `${where}.any[${i}]`)) };
  }

  const { fact, op } = raw;
  if (typeof fact !== 'string' || fact.length === 0) {
    throw new ConfigurationError(`${where}: condition needs a fact name`);
  }

  if (includes(NUMERIC_OPS, op)) {
    if (!isFiniteNumber(raw.value)) {
      throw new ConfigurationError(`${where}: '${op}' needs a numeric value`);
    }
    return { fact, op, value: raw.value };
  }
  if (includes(EQUALITY_OPS, op)) {
    if (!isFactValue(raw.value)) {
      throw new ConfigurationError(`${where}: '${op}' needs a scalar value`);
    }
    return { fact, op, value: raw.value };
  }
  if (op === 'between') {
    if (!isFiniteNumber(raw.min) || !isFiniteNumber(raw.max) || raw.min > raw.max) {
      throw new ConfigurationError(`${where}: 'between' needs numeric min <= max`);
    }
    return { fact, op, min: raw.min, max: raw.max };
  }
  if (includes(PRESENCE_OPS, op)) {
    return { fact, op };
  }

  throw new ConfigurationError(`${where}: unknown operator '${String(op)}'`);
}

export function parseRuleTable(name: string, raw: unknown): RuleTable {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Rule table '${name}' must be an object`);
  }
  if (typeof raw.category !== 'string' || raw.category.length === 0) {
    throw new ConfigurationError(`Rule table '${name}' needs a category`);
  }
  const base = raw.base ?? 0.5;
  if (!isFiniteNumber(base) || base < 0 || base > 1) {
    throw new ConfigurationError(`Rule table '${name}' base must be within [0, 1]`);
  }
  if (!Array.isArray(raw.rules)) {
    throw new ConfigurationError(`Rule table '${name}' needs a rules array`);
  }

  const seen = new Set<string>();
  const rules = raw.rules.map((entry, i): RuleDefinition => {
    const where = `${name}.rules[${i}]`;
    if (!isRecord(entry) || typeof entry.name !== 'string' || entry.name.length === 0) {
      throw new ConfigurationError(`${where}: rule needs a name`);
    }
    if (seen.has(entry.name)) {
      throw new ConfigurationError(`${where}: duplicate rule '${entry.name}'`);
    }
    seen.add(entry.name);
    if (!isFiniteNumber(entry.delta)) {
      throw new ConfigurationError(`${where}: rule '${entry.name}' needs a numeric delta`);
    }
    if (typeof entry.reason !== 'string') {
      throw new ConfigurationError(`${where}: rule '${entry.name}' needs a reason`);
    }
    return {
      name: entry.name,
      when: parseCondition(entry.when, `${where}.when`),
      delta: entry.delta,
      reason: entry.reason,
    };
  });

  return Object.freeze({ name, category: raw.category, base, rules: Object.freeze(rules) });
}

/**
 * Reads every `*.json` file of `dir` as a rule table named after the file.
 */
export function loadRuleTables(dir: string): Map<string, RuleTable> {
  let files: string[];
  try {
    files = fs.readdirSync(dir).filter(file => file.endsWith('.json'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read rules directory ${dir}: ${errorMessage(error)}`);
  }

  const tables = new Map<string, RuleTable>();
  for (const file of files.sort()) {
    const name = path.basename(file, '.json');
    let raw: unknown;
    try {
      raw = readJsonFile(path.join(dir, file));
    } catch (error) {
      throw new ConfigurationError(`Rule table ${file} is not valid JSON: ${errorMessage(error)}`);
    }
    tables.set(name, parseRuleTable(name, raw));
  }
  return tables;
}
