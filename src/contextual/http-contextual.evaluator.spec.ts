import axios from 'axios';
import contextualConfig from '../config/contextual.config';
import { ContextualEvaluatorError } from '../common/errors';
import { RecordGenerator } from '../../test/utils/record-generator';
import { HttpContextualEvaluator } from './http-contextual.evaluator';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe('HttpContextualEvaluator', () => {
  const config = {
    ...contextualConfig(),
    provider: 'http' as const,
    baseURL: 'http://localhost:9999/v1',
    apiKey: 'test-secret',
    model: 'test-model',
    maxRetries: 1,
    retryDelayMs: 1,
  };
  let evaluator: HttpContextualEvaluator;

  const reply = (content: string | null) => ({
    data: { model: 'test-model-001', choices: [{ message: { content } }] },
  });

  beforeEach(() => {
    jest.resetAllMocks();
    (mockedAxios.create as jest.Mock).mockReturnValue(mockedAxios);
    evaluator = new HttpContextualEvaluator(config);
  });

  it('should create a client with bearer auth and the configured timeout', () => {
    expect(mockedAxios.create).toHaveBeenCalledWith({
      baseURL: 'http://localhost:9999/v1',
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-secret',
      },
    });
  });

  it('should post a chat completion and parse the reply', async () => {
    mockedAxios.post.mockResolvedValueOnce(
      reply('{"gym_probability": 0.8, "cafe_probability": 0.3, "gym_reasoning": "Offices"}'),
    );

    const assessment = await evaluator.assess(RecordGenerator.bev(), ['gym', 'cafe']);

    expect(assessment.probabilities).toEqual({ gym: 0.8, cafe: 0.3 });
    expect(assessment.reasoning).toEqual({ gym: 'Offices' });
    expect(assessment.model).toBe('test-model-001');
    expect(mockedAxios.post).toHaveBeenCalledWith(
      '/chat/completions',
      expect.objectContaining({ model: 'test-model', response_format: { type: 'json_object' } }),
      { signal: undefined },
    );
  });

  it('should retry a timed out request', async () => {
    mockedAxios.isAxiosError.mockReturnValue(true);
    mockedAxios.post
      .mockRejectedValueOnce({ code: 'ECONNABORTED', message: 'timeout exceeded', request: {} })
      .mockResolvedValueOnce(reply('{"gym_probability": 0.55}'));

    const assessment = await evaluator.assess(RecordGenerator.bev(), ['gym']);

    expect(assessment.probabilities).toEqual({ gym: 0.55 });
    expect(mockedAxios.post).toHaveBeenCalledTimes(2);
  });

  it('should give up once retries are spent', async () => {
    mockedAxios.isAxiosError.mockReturnValue(true);
    mockedAxios.post.mockRejectedValue({
      code: 'ERR_BAD_RESPONSE',
      message: 'Request failed',
      response: { status: 503, statusText: 'Service Unavailable', data: { error: { message: 'overloaded' } } },
    });

    await expect(evaluator.assess(RecordGenerator.bev(), ['gym'])).rejects.toThrow(
      'Contextual endpoint answered 503: overloaded',
    );
    expect(mockedAxios.post).toHaveBeenCalledTimes(2);
  });

  it('should not retry client errors', async () => {
    mockedAxios.isAxiosError.mockReturnValue(true);
    mockedAxios.post.mockRejectedValue({
      message: 'Request failed',
      response: { status: 401, statusText: 'Unauthorized', data: {} },
    });

    await expect(evaluator.assess(RecordGenerator.bev(), ['gym'])).rejects.toThrow(
      'Contextual endpoint answered 401: Unauthorized',
    );
    expect(mockedAxios.post).toHaveBeenCalledTimes(1);
  });

  it('should reject an empty reply', async () => {
    mockedAxios.post.mockResolvedValueOnce(reply(null));

    await expect(evaluator.assess(RecordGenerator.bev(), ['gym'])).rejects.toBeInstanceOf(
      ContextualEvaluatorError,
    );
  });
});
