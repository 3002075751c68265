import type { UpdateCheckOutcome } from '@shared/contracts';
import type { UpdateCheckWorker } from '@main/services/update/UpdateCheckWorker';

export class NoopUpdateCheckWorker implements UpdateCheckWorker {
  async run(): Promise<UpdateCheckOutcome> {
    return { kind: 'none' };
  }
}
