import fs from 'node:fs';
import path from 'node:path';
import config from 'config';
import { ConfigurationError } from '../errors.js';
import { validateAgainstSchema, type JsonSchema } from '../utils/schema.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type ThresholdRangeConfig = {
  start: number;
  stop: number;
  count: number;
};

export type AreaRangeConfig = {
  label: string;
  min: number;
  max: number;
};

export type EvaluationConfig = {
  iouType: string;
  iouThresholds: ThresholdRangeConfig;
  recallThresholds: ThresholdRangeConfig;
  maxDets: number[];
  areaRanges: AreaRangeConfig[];
};

export type EngineConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  evaluation: EvaluationConfig;
};

const thresholdRangeSchema: JsonSchema = {
  type: 'object',
  required: ['start', 'stop', 'count'],
  additionalProperties: false,
  properties: {
    start: { type: 'number', minimum: 0, maximum: 1 },
    stop: { type: 'number', minimum: 0, maximum: 1 },
    count: { type: 'integer', minimum: 1 }
  }
};

const evaluationConfigSchema: JsonSchema = {
  type: 'object',
  required: ['iouType', 'iouThresholds', 'recallThresholds', 'maxDets', 'areaRanges'],
  additionalProperties: false,
  properties: {
    iouType: { type: 'string' },
    iouThresholds: thresholdRangeSchema,
    recallThresholds: thresholdRangeSchema,
    maxDets: {
      type: 'array',
      minItems: 1,
      items: { type: 'integer', minimum: 1 }
    },
    areaRanges: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['label', 'min', 'max'],
        additionalProperties: false,
        properties: {
          label: { type: 'string' },
          min: { type: 'number', minimum: 0 },
          max: { type: 'number', minimum: 0 }
        }
      }
    }
  }
};

const engineConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'evaluation'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    evaluation: evaluationConfigSchema
  }
};

export function validateEvaluationConfig(
  value: unknown,
  pathLabel = 'config.evaluation'
): asserts value is EvaluationConfig {
  const errors = validateAgainstSchema(evaluationConfigSchema, value, pathLabel);
  if (errors.length > 0) {
    throw new ConfigurationError(errors.join('; '));
  }
  validateLogicalEvaluationConfig(value as EvaluationConfig, pathLabel);
}

export function validateConfig(value: unknown): asserts value is EngineConfig {
  const errors = validateAgainstSchema(engineConfigSchema, value, 'config');
  if (errors.length > 0) {
    throw new ConfigurationError(errors.join('; '));
  }
  validateLogicalEvaluationConfig((value as EngineConfig).evaluation, 'config.evaluation');
}

export function parseConfig(contents: string): EngineConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): EngineConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/**
 * Evaluation defaults from the `config` package (config/default.json and the
 * NODE_ENV overlay), validated and detached from the frozen config tree.
 */
export function getEvaluationConfig(): EvaluationConfig {
  if (!config.has('evaluation')) {
    throw new ConfigurationError('config.evaluation is required');
  }
  const raw: unknown = structuredClone(config.get<unknown>('evaluation'));
  validateEvaluationConfig(raw);
  return raw;
}

function validateLogicalEvaluationConfig(evaluation: EvaluationConfig, pathLabel: string) {
  const messages: string[] = [];

  if (evaluation.iouType !== 'bbox') {
    messages.push(`${pathLabel}.iouType "${evaluation.iouType}" is not supported (expected "bbox")`);
  }

  for (const key of ['iouThresholds', 'recallThresholds'] as const) {
    const range = evaluation[key];
    if (range.stop < range.start) {
      messages.push(`${pathLabel}.${key}.stop must be greater than or equal to start`);
    }
    if (range.count === 1 && range.stop !== range.start) {
      messages.push(`${pathLabel}.${key}.count must be greater than 1 when start and stop differ`);
    }
  }

  evaluation.maxDets.forEach((value, index) => {
    const previous = evaluation.maxDets[index - 1];
    if (index > 0 && typeof previous === 'number' && value <= previous) {
      messages.push(`${pathLabel}.maxDets must be strictly ascending`);
    }
  });

  const labels = new Set<string>();
  evaluation.areaRanges.forEach((range, index) => {
    if (!range.label.trim()) {
      messages.push(`${pathLabel}.areaRanges[${index}].label must be a non-empty string`);
    }
    if (labels.has(range.label)) {
      messages.push(`${pathLabel}.areaRanges[${index}] duplicates label "${range.label}"`);
    }
    labels.add(range.label);
    if (range.max < range.min) {
      messages.push(`${pathLabel}.areaRanges[${index}].max must be greater than or equal to min`);
    }
  });

  if (!labels.has('all')) {
    messages.push(`${pathLabel}.areaRanges must include an "all" range`);
  }

  if (messages.length > 0) {
    throw new ConfigurationError(messages.join('; '));
  }
}
