import { ContextualEvaluatorError } from '../common/errors';
import { clamp } from '../common/utils/math.util';
import { isFiniteNumber, isRecord } from '../common/utils/json.util';
import { ContextualAssessment } from './interfaces/contextual.interface';

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Reads a model reply into an assessment. Categories the reply gives no
 * usable probability for are left out; a reply with none at all is an error.
 */
export function parseAssessment(
  content: string,
  categories: readonly string[],
  model: string,
): ContextualAssessment {
  const trimmed = content.trim();
  const body = CODE_FENCE.exec(trimmed)?.[1] ?? trimmed;
  const data = parseJson(body);

  const assessment: ContextualAssessment = {
    probabilities: {},
    reasoning: {},
    keyFactors: [],
    risks: [],
    model,
  };

  if (isRecord(data)) {
    for (const category of categories) {
      const probability = data[`${category}_probability`];
      if (isFiniteNumber(probability)) {
        assessment.probabilities[category] = clamp(probability);
      }
      const reasoning = data[`${category}_reasoning`];
      if (typeof reasoning === 'string' && reasoning.length > 0) {
        assessment.reasoning[category] = reasoning;
      }
    }
    assessment.keyFactors = stringList(data.key_factors);
    assessment.risks = stringList(data.risks);
    if (typeof data.recommendation === 'string') {
      assessment.recommendation = data.recommendation;
    }
  } else {
    // Not JSON; pick probabilities out of free text
    const text = body.toLowerCase();
    for (const category of categories) {
      const pattern = new RegExp(`${escapeRegExp(category.toLowerCase())}[_\\s]?probability["\\s:]+([0-9.]+)`);
      const match = pattern.exec(text);
      const probability = match ? Number(match[1]) : NaN;
      if (Number.isFinite(probability)) {
        assessment.probabilities[category] = clamp(probability);
      }
    }
  }

  if (Object.keys(assessment.probabilities).length === 0) {
    throw new ContextualEvaluatorError('Contextual reply carried no usable probabilities');
  }
  return assessment;
}
