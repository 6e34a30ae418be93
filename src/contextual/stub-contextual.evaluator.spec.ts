import { ContextualEvaluatorError } from '../common/errors';
import { RecordGenerator } from '../../test/utils/record-generator';
import { StubContextualEvaluator } from './stub-contextual.evaluator';

describe('StubContextualEvaluator', () => {
  const evaluator = new StubContextualEvaluator();

  it('should weigh demand drivers against competitors', async () => {
    const bev = RecordGenerator.bev({
      density: { offices: 10, residential: 5, gyms: 2 },
      transitWithin500m: true,
    });

    const assessment = await evaluator.assess(bev, ['gym', 'cafe']);

    expect(assessment.probabilities).toEqual({ gym: 0.5, cafe: 0.55 });
    expect(assessment.reasoning.gym).toBe('15 demand driver(s) and 2 competitor(s) within 1000m');
    expect(assessment.keyFactors).toEqual(['Transit within 500m']);
    expect(assessment.model).toBe('stub');
  });

  it('should be deterministic', async () => {
    const bev = RecordGenerator.bev({ density: { universities: 3, cafes: 4 } });

    const first = await evaluator.assess(bev, ['cafe']);
    const second = await evaluator.assess(bev, ['cafe']);

    expect(second).toEqual(first);
  });

  it('should give a neutral estimate for categories it has no profile for', async () => {
    const assessment = await evaluator.assess(RecordGenerator.bev(), ['bakery']);

    expect(assessment.probabilities).toEqual({ bakery: 0.5 });
  });

  it('should reject an aborted request', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      evaluator.assess(RecordGenerator.bev(), ['gym'], controller.signal),
    ).rejects.toBeInstanceOf(ContextualEvaluatorError);
  });
});
