import { registerAs } from '@nestjs/config';
import { floatFromEnv, intFromEnv, stringFromEnv } from './env.util';

export type ContextualProvider = 'stub' | 'http';

function contextualProvider(): ContextualProvider {
  return stringFromEnv('CONTEXTUAL_PROVIDER', 'stub') === 'http' ? 'http' : 'stub';
}

export default registerAs('contextual', () => ({
  provider: contextualProvider(),
  timeoutMs: intFromEnv('CONTEXTUAL_TIMEOUT_MS', 8000),

  // OpenAI-compatible chat completions endpoint
  baseURL: stringFromEnv('CONTEXTUAL_API_URL', 'https://api.groq.com/openai/v1'),
  apiKey: process.env.CONTEXTUAL_API_KEY || undefined,
  model: stringFromEnv('CONTEXTUAL_MODEL', 'llama-3.1-8b-instant'),
  temperature: floatFromEnv('CONTEXTUAL_TEMPERATURE', 0.3),
  maxTokens: intFromEnv('CONTEXTUAL_MAX_TOKENS', 800),
  maxRetries: intFromEnv('CONTEXTUAL_MAX_RETRIES', 1),
  retryDelayMs: intFromEnv('CONTEXTUAL_RETRY_DELAY_MS', 300),
}));
