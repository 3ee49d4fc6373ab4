import os from 'os';
import type { MachineIdentity } from '@evaluator/shared';

/** Read on every pass; the hostname may change while the evaluator runs. */
export function resolveIdentity(): MachineIdentity {
  return {
    machineId: os.hostname(),
    processId: String(process.pid),
  };
}
