import { allocate } from './allocate';
import { reconcile } from './reconcile';
import { tally } from './tally';
import { detectPreferenceColumns } from '@/utils/columnDetection';
import { ALLOC_VERBOSE_LOGS } from '@/utils/featureFlags';
import type { AllocationOptions, PipelineResult, Table } from '@/types/allocation';

/**
 * allocate → reconcile → tally over one input table.
 * Any stage error aborts the run; nothing partial is returned.
 */
export function runAllocationPipeline(input: Table, options: AllocationOptions = {}): PipelineResult {
  const verbose = options.verbose ?? ALLOC_VERBOSE_LOGS;
  const detection = detectPreferenceColumns(input.headers);

  let mark = Date.now();
  const lap = () => {
    const now = Date.now();
    const elapsed = now - mark;
    mark = now;
    return elapsed;
  };

  const sorted = allocate(input, options);
  const allocateMs = lap();
  const final = reconcile(input, sorted, options);
  const reconcileMs = lap();
  const counts = tally(input, options);
  const tallyMs = lap();

  if (verbose) {
    console.log(
      `[pipeline] students=${input.rows.length} cgpa=${detection.cgpaColumn} prefs=${detection.preferenceColumns.length} faculties=${counts.rows.length} allocate_ms=${allocateMs} reconcile_ms=${reconcileMs} tally_ms=${tallyMs}`
    );
  }

  return { sorted, final, tally: counts, detection };
}
