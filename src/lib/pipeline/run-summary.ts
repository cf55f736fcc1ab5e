import { MultiColumnASCIITable } from '../ascii-tables/multi-column-ascii-table';
import type { PipelineRun, StageRecord } from './types';

function formatDuration(durationMS: number | null): string {
  if (durationMS === null) {
    return '-';
  }

  return durationMS < 1000
    ? `${durationMS}ms`
    : `${(durationMS / 1000).toFixed(1)}s`;
}

function describeOutcome(stage: StageRecord): string {
  if (stage.outcome === 'failure' && stage.policy === 'best-effort') {
    return 'failure (ignored)';
  }

  return stage.outcome;
}

/**
 * One row per stage, followed by the run's status line
 */
export function renderRunSummary(
  run: Readonly<PipelineRun>,
  options: { tableWidth?: number } = {},
): string {
  const table = new MultiColumnASCIITable(
    ['Stage', 'Policy', 'Outcome', 'Duration'],
    { tableWidth: options.tableWidth ?? 80 },
  );

  for (const stage of run.stages) {
    table.addRow([
      stage.name,
      stage.policy,
      describeOutcome(stage),
      formatDuration(stage.durationMS),
    ]);
  }

  const status =
    run.status === 'success'
      ? `Run ${run.id} succeeded (build ${run.buildID})`
      : `Run ${run.id} failed at ${run.failedStage ?? 'an unknown stage'}`;

  return `${table.toString()}\n${status}`;
}
