import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import pino from 'pino';
import { AnnotationStore } from '../src/annotations/store.js';
import { loadConfigFromFile, type EvaluationConfig } from '../src/config/index.js';
import { InputContractError } from '../src/errors.js';
import { DetectionEvaluator } from '../src/evaluation/evaluator.js';
import { getLogLevel, type Logger } from '../src/logger.js';
import type { BoxCorners, Prediction, Target } from '../src/types.js';
import { validateAgainstSchema, type JsonSchema } from '../src/utils/schema.js';

type Writable = Pick<NodeJS.WritableStream, 'write'>;

type IoStreams = {
  stdout: Writable;
  stderr: Writable;
};

export type PredictionFileEntry = {
  image_id: number;
  boxes: BoxCorners[];
  scores: number[];
  labels: number[];
};

const predictionFileSchema: JsonSchema = {
  type: 'array',
  items: {
    type: 'object',
    required: ['image_id', 'boxes', 'scores', 'labels'],
    properties: {
      image_id: { type: 'integer' },
      boxes: {
        type: 'array',
        items: { type: 'array', minItems: 4, maxItems: 4, items: { type: 'number' } }
      },
      scores: { type: 'array', items: { type: 'number' } },
      labels: { type: 'array', items: { type: 'integer', minimum: 0 } }
    }
  }
};

function printUsage(target: Writable) {
  target.write(
    [
      'Bounding-box evaluation helper',
      '',
      'Usage:',
      '  npm run evaluate -- --annotations <file> --predictions <file> [--per-class] [--pretty]',
      '',
      'Options:',
      '  -a, --annotations <path>  COCO annotation file with the ground truth',
      '  -p, --predictions <path>  JSON array of { image_id, boxes, scores, labels }',
      '  -c, --config <path>       Load the evaluation protocol from an alternate config file',
      '  --per-class               Report AP per category, named after the annotation categories',
      '  --pretty                  Pretty-print JSON output with indentation',
      '  -h, --help                Show this help message'
    ].join('\n') + '\n'
  );
}

type ParsedArgs = {
  annotationsPath: string | null;
  predictionsPath: string | null;
  configPath: string | null;
  perClass: boolean;
  pretty: boolean;
  help: boolean;
  errors: string[];
};

type PathOption = 'annotationsPath' | 'predictionsPath' | 'configPath';

const PATH_FLAGS: Record<string, PathOption> = {
  '--annotations': 'annotationsPath',
  '-a': 'annotationsPath',
  '--predictions': 'predictionsPath',
  '-p': 'predictionsPath',
  '--config': 'configPath',
  '-c': 'configPath'
};

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    annotationsPath: null,
    predictionsPath: null,
    configPath: null,
    perClass: false,
    pretty: false,
    help: false,
    errors: []
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    const separator = token.startsWith('--') ? token.indexOf('=') : -1;
    const flag = separator > 0 ? token.slice(0, separator) : token;
    const inlineValue = separator > 0 ? token.slice(separator + 1) : undefined;
    const option = PATH_FLAGS[flag];
    if (option) {
      const value = inlineValue ?? argv[index + 1];
      if (!value) {
        parsed.errors.push(`Missing value for ${flag}`);
      } else {
        parsed[option] = value;
        if (inlineValue === undefined) {
          index += 1;
        }
      }
      continue;
    }

    switch (token) {
      case '--per-class':
        parsed.perClass = true;
        break;
      case '--pretty':
        parsed.pretty = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        parsed.errors.push(`Unknown option: ${token}`);
        break;
    }
  }

  if (!parsed.help) {
    if (!parsed.annotationsPath) {
      parsed.errors.push('Missing required option --annotations');
    }
    if (!parsed.predictionsPath) {
      parsed.errors.push('Missing required option --predictions');
    }
  }
  return parsed;
}

export function assertPredictionFile(value: unknown, source = 'predictions'): asserts value is PredictionFileEntry[] {
  const errors = validateAgainstSchema(predictionFileSchema, value, source);
  if (errors.length > 0) {
    throw new InputContractError(errors.join('; '));
  }
}

export function readPredictionFile(filePath: string): PredictionFileEntry[] {
  const resolvedPath = path.resolve(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputContractError(`Failed to read ${resolvedPath}: ${message}`);
  }
  assertPredictionFile(parsed, resolvedPath);
  return parsed;
}

function createReportLogger(): Logger {
  return pino({ name: 'boxeval-evaluate', level: getLogLevel() }, pino.destination(2));
}

export type EvaluateOptions = {
  logger?: Logger;
};

export async function runEvaluate(
  argv: string[],
  streams: IoStreams = { stdout: process.stdout, stderr: process.stderr },
  options: EvaluateOptions = {}
): Promise<number> {
  const args = parseArgs(argv);
  if (args.help && args.errors.length === 0) {
    printUsage(streams.stdout);
    return 0;
  }

  if (args.errors.length > 0 || !args.annotationsPath || !args.predictionsPath) {
    args.errors.forEach(error => {
      streams.stderr.write(`${error}\n`);
    });
    printUsage(streams.stderr);
    return 1;
  }

  try {
    const evaluation: EvaluationConfig | undefined = args.configPath
      ? loadConfigFromFile(args.configPath).evaluation
      : undefined;
    const groundTruth = AnnotationStore.fromFile(args.annotationsPath);
    const entries = readPredictionFile(args.predictionsPath);

    const evaluator = new DetectionEvaluator(groundTruth, {
      evaluation,
      logger: options.logger ?? createReportLogger()
    });
    const predictions = entries.map((entry): Prediction => ({
      boxes: entry.boxes,
      scores: entry.scores,
      labels: entry.labels
    }));
    const targets = entries.map((entry): Target => ({ imageId: entry.image_id }));
    evaluator.update(predictions, targets);

    const classNames = args.perClass
      ? [...groundTruth.getCategories()].sort((a, b) => a.id - b.id).map(category => category.name)
      : undefined;
    const result = await evaluator.compute({ classNames });

    const report = [...result.summaryLines, result.table, ...(result.categoryTable ? [result.categoryTable] : [])];
    streams.stderr.write(`${report.join('\n')}\n`);

    const payload = {
      metrics: result.metrics,
      stats: Object.fromEntries(result.statNames.map((name, index) => [name, result.stats[index]]))
    };
    const output = args.pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload);
    streams.stdout.write(`${output}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    streams.stderr.write(`Evaluation failed: ${message}\n`);
    return 1;
  }
}

const scriptName = path.basename(process.argv[1] ?? '');

if (scriptName === 'evaluate.ts' || scriptName === 'evaluate.js') {
  runEvaluate(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  }).catch(error => {
    process.stderr.write(`Evaluate failed: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
}
