import type { UpdateCheckOutcome } from '@shared/contracts';

/**
 * A single update check. `run` is called at most once per instance and resolves with exactly one outcome;
 * transport failures are reported as an `error` outcome rather than a rejection.
 */
export interface UpdateCheckWorker {
  run(): Promise<UpdateCheckOutcome>;
}

export type UpdateCheckWorkerFactory = () => UpdateCheckWorker;
