// List targets command
// Prints the static facts of every supported target

import { TARGETS, describeTarget } from '../../main/framework-test';
import { emitTarget } from '../output/jsonl';
import { formatTarget } from '../output/formatter';

export function listTargets(options: { json?: boolean }): void {
  for (const target of TARGETS) {
    const descriptor = describeTarget(target);
    if (options.json) {
      emitTarget(descriptor);
    } else {
      console.log(formatTarget(descriptor));
    }
  }
}
