/**
 * Engine params (engine.json)
 *
 * {
 *   "id": "default",
 *   "engineFactory": "classification",
 *   "datasource": { "params": { "appName": "MyApp1" } },
 *   "algorithms": [{ "name": "naive", "params": { "lambda": 1.0 } }]
 * }
 */

import fs from 'fs';
import { z } from 'zod';
import { ValidationError, errorMessage } from '../../common/errors.js';

const ParamsSchema = z.record(z.unknown());

const StageSchema = z.object({
  params: ParamsSchema.default({}),
});

const AlgorithmSchema = z.object({
  name: z.string().min(1),
  params: ParamsSchema.default({}),
});

export const EngineParamsSchema = z.object({
  id: z.string().min(1).default('default'),
  description: z.string().optional(),
  engineFactory: z.string().min(1),
  datasource: StageSchema.default({}),
  preparator: StageSchema.default({}),
  algorithms: z.array(AlgorithmSchema).min(1),
  serving: StageSchema.default({}),
});

export type EngineParams = z.infer<typeof EngineParamsSchema>;

export function parseEngineParams(raw: unknown): EngineParams {
  const parsed = EngineParamsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'engine.json'}: ${i.message}`);
    throw new ValidationError(`Invalid engine params: ${issues[0]}`, issues);
  }
  return parsed.data;
}

export function loadEngineParams(filePath: string): EngineParams {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ValidationError(`Cannot read ${filePath}: ${errorMessage(err)}`);
  }
  return parseEngineParams(raw);
}

/**
 * Parses a stage's params with its own schema; failures name the stage.
 */
export function parseStageParams<T>(
  stage: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params: Record<string, unknown>
): T {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${stage}.${i.path.join('.')}: ${i.message}`);
    throw new ValidationError(`Invalid ${stage} params: ${issues[0]}`, issues);
  }
  return parsed.data;
}
