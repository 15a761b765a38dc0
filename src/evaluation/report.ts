import { InputContractError } from '../errors.js';
import defaultLogger, { type Logger } from '../logger.js';
import { createSmallTable, renderPipeTable, type CellValue } from '../utils/table.js';
import { categoryAveragePrecision, type EvaluationSummary } from './statistics.js';

export const BOX_METRICS = ['AP', 'AP50', 'AP75', 'APs', 'APm', 'APl'] as const;

export type CategoryAveragePrecision = {
  category: string;
  categoryId: number;
  ap: number;
};

export type SummaryMetrics = {
  /** Box AP metrics scaled to percent, plus `AP-<class>` entries when class names were given. */
  metrics: Record<string, number>;
  /** The twelve raw statistics in [0, 1], NaN where undefined. */
  stats: number[];
  statNames: string[];
  summaryLines: string[];
  table: string;
  perCategory: CategoryAveragePrecision[] | null;
  categoryTable: string | null;
};

function toPercent(value: number): number {
  return value >= 0 ? value * 100 : Number.NaN;
}

export function formatCategoryTable(perCategory: readonly CategoryAveragePrecision[]): string {
  const columns = Math.min(6, perCategory.length * 2);
  const flattened: CellValue[] = perCategory.flatMap(entry => [entry.category, entry.ap]);
  const rows: CellValue[][] = [];
  for (let start = 0; start < flattened.length; start += columns) {
    const row = flattened.slice(start, start + columns);
    while (row.length < columns) {
      row.push(null);
    }
    rows.push(row);
  }
  const headers = Array.from({ length: columns }, (_, index) => (index % 2 === 0 ? 'category' : 'AP'));
  return renderPipeTable({ headers, rows, align: 'left' });
}

export type DeriveResultsOptions = {
  classNames?: readonly string[];
  logger?: Logger;
};

/**
 * Turns a summarized evaluation into the reported metrics. `null` stands for
 * an evaluation that never saw a prediction: every metric is NaN.
 */
export function deriveResults(summary: EvaluationSummary | null, options: DeriveResultsOptions = {}): SummaryMetrics {
  const log = options.logger ?? defaultLogger;

  if (!summary) {
    log.warn({ component: 'evaluation' }, 'No predictions from the model!');
    const metrics = Object.fromEntries(BOX_METRICS.map(metric => [metric, Number.NaN]));
    return {
      metrics,
      stats: [],
      statNames: [],
      summaryLines: [],
      table: createSmallTable(metrics),
      perCategory: null,
      categoryTable: null
    };
  }

  const metrics: Record<string, number> = Object.fromEntries(
    BOX_METRICS.map((metric, index) => [metric, toPercent(summary.stats[index] ?? -1)])
  );
  const table = createSmallTable(metrics);
  log.info({ component: 'evaluation' }, `Evaluation results for bbox:\n${table}`);

  if (!Number.isFinite(Object.values(metrics).reduce((sum, value) => sum + value, 0))) {
    log.info({ component: 'evaluation' }, 'Some metrics cannot be computed and is shown as NaN.');
  }

  const base = {
    stats: summary.stats.map(value => (value >= 0 ? value : Number.NaN)),
    statNames: [...summary.statNames],
    summaryLines: [...summary.lines],
    table
  };

  const classNames = options.classNames;
  if (!classNames || classNames.length <= 1) {
    return { ...base, metrics, perCategory: null, categoryTable: null };
  }

  const { accumulated } = summary;
  if (classNames.length !== accumulated.categoryIds.length) {
    throw new InputContractError(
      `Received ${classNames.length} class names for ${accumulated.categoryIds.length} evaluated categories`
    );
  }

  const perCategory = classNames.map((name, k) => ({
    category: name,
    categoryId: accumulated.categoryIds[k],
    ap: toPercent(categoryAveragePrecision(accumulated, k))
  }));
  const categoryTable = formatCategoryTable(perCategory);
  log.info({ component: 'evaluation' }, `Per-category bbox AP:\n${categoryTable}`);

  for (const entry of perCategory) {
    metrics[`AP-${entry.category}`] = entry.ap;
  }

  return { ...base, metrics, perCategory, categoryTable };
}
