import type { TaskCompletion } from './git/types.ts';
import { describeSuccess } from './fleet/aggregator.ts';

export function print(message: string): void {
  process.stdout.write(message + '\n');
}

export function printError(message: string): void {
  process.stderr.write(message + '\n');
}

// Status messages to stderr (keeps stdout clean for data output like paths)
export function printStatus(message: string): void {
  process.stderr.write(message + '\n');
}

// One line per finished task, as printed by the bulk commands
export function formatCompletion(
  name: string,
  { outcome }: TaskCompletion
): string {
  if (outcome.success) {
    return `  ✓ ${name}: ${describeSuccess(outcome.data)}`;
  }
  const reason = outcome.error.split('\n')[0] ?? outcome.error;
  return `  ✗ ${name}: ${outcome.kind}: ${reason}`;
}
