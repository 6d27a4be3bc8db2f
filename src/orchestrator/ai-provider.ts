import { z } from 'zod';
import { PermanentProviderError, TransientProviderError } from '../errors.js';
import { postJson } from '../lib/http.js';

export type AITask = 'extract_knowledge' | 'course_outline' | 'lesson_content' | 'component_regen';

export interface AIRequest {
  task: AITask;
  tenantId: string;
  input: Record<string, unknown>;
  /** Supporting material, most relevant first. */
  context: string[];
}

export interface AIResponse {
  output: unknown;
  tokensUsed: number;
}

/** The external model. Prompting and model choice live behind this port. */
export interface AIProvider {
  generate(request: AIRequest): Promise<AIResponse>;
}

const AIResponseSchema = z.object({
  output: z.unknown(),
  tokensUsed: z.number().int().min(0).default(0),
});

export class HttpAIProvider implements AIProvider {
  constructor(private options: { url: string; key?: string; timeoutMs: number }) {}

  async generate(request: AIRequest): Promise<AIResponse> {
    const body = await postJson('ai-provider', this.options.url, request, {
      token: this.options.key,
      timeoutMs: this.options.timeoutMs,
    });
    const parsed = AIResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransientProviderError('ai-provider', 'response envelope is malformed');
    }
    const { output, tokensUsed } = parsed.data;
    return { output, tokensUsed };
  }
}

/** Stands in when no provider is configured; every job fails without retrying. */
export class UnconfiguredAIProvider implements AIProvider {
  async generate(): Promise<AIResponse> {
    throw new PermanentProviderError('ai-provider', 'AI_PROVIDER_URL is not configured');
  }
}

/** Parses model output, treating a malformed answer as worth another attempt. */
export function parseOutput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, output: unknown, task: AITask): T {
  const parsed = schema.safeParse(output);
  if (!parsed.success) {
    throw new TransientProviderError('ai-provider', `malformed ${task} output`, {
      issues: parsed.error.issues.slice(0, 5),
    });
  }
  return parsed.data;
}
