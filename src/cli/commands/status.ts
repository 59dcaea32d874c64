/**
 * Status Command Handler
 *
 * Probes the configured inference backend and prints whether it is
 * reachable and whether the model is available.
 */

import type { CoachingService } from '../../core/coaching';
import type { BackendStatus } from '../../llm';
import { bold, dim, green, red, yellow, consolePrinter, type Printer } from '../utils/terminal';

export function formatBackendStatus(status: BackendStatus): string[] {
  const state = !status.reachable
    ? red('unreachable')
    : status.modelAvailable
      ? green('ready')
      : yellow('model missing');

  return [
    bold('Inference Backend'),
    `  Provider: ${status.provider}`,
    `  Model: ${status.model}`,
    `  State: ${state}`,
    dim(`  ${status.message}`),
  ];
}

/**
 * Prints the backend status. Resolves to true when the backend is ready.
 */
export async function runStatusCommand(
  service: CoachingService,
  print: Printer = consolePrinter
): Promise<boolean> {
  const status = await service.status();

  print();
  for (const line of formatBackendStatus(status)) {
    print(line);
  }
  print();

  return status.reachable && status.modelAvailable;
}
