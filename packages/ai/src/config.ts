import { z } from 'zod';

/**
 * Agent roles. Each role gets its own model so search and browser control can be
 * tuned independently.
 */
export type AgentRole = 'searcher' | 'executor';

export const DEFAULT_MODEL = 'google/gemini-2.0-flash-001';

export const modelConfigSchema = z.object({
  searcher: z.string().min(1),
  executor: z.string().min(1),
});

/** Maps each role to a concrete OpenRouter model ID. */
export type ModelConfig = z.infer<typeof modelConfigSchema>;

/**
 * Load model configuration from environment variables.
 * Override by setting CARTPILOT_MODEL_SEARCHER, CARTPILOT_MODEL_EXECUTOR.
 */
export function loadModelConfig(env: NodeJS.ProcessEnv = process.env): ModelConfig {
  return modelConfigSchema.parse({
    searcher: env.CARTPILOT_MODEL_SEARCHER || DEFAULT_MODEL,
    executor: env.CARTPILOT_MODEL_EXECUTOR || DEFAULT_MODEL,
  });
}
