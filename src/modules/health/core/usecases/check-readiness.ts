/**
 * Check Readiness Use Case
 *
 * Pings every dependency at once, each under the same timeout.
 */

import { err, type Result } from 'neverthrow';

import type { DependencyCheck } from '../ports.js';
import type { ComponentReport, ReadinessReport, ReadinessState } from '../types.js';

export interface CheckReadinessDeps {
  checks: readonly DependencyCheck[];
  timeoutMs: number;
  /** Milliseconds, for latency (default: Date.now) */
  clock?: () => number;
}

export interface CheckReadinessInput {
  checkedAt: string;
  uptimeSeconds: number;
  version?: string | undefined;
}

const pingWithin = async (
  check: DependencyCheck,
  timeoutMs: number
): Promise<Result<void, string>> => {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<Result<void, string>>((resolve) => {
    timer = setTimeout(() => {
      resolve(err(`No answer from ${check.component} within ${String(timeoutMs)}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([check.ping(), expired]);
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  } finally {
    clearTimeout(timer);
  }
};

export const inspectDependency = async (
  check: DependencyCheck,
  timeoutMs: number,
  clock: () => number
): Promise<ComponentReport> => {
  const started = clock();
  const outcome = await pingWithin(check, timeoutMs);
  const report = {
    component: check.component,
    critical: check.critical,
    latencyMs: Math.max(0, Math.round(clock() - started)),
  };

  return outcome.match(
    (): ComponentReport => ({ ...report, up: true }),
    (error): ComponentReport => ({ ...report, up: false, error })
  );
};

/**
 * Down and critical → unavailable; down but optional → degraded.
 */
export const summarizeReadiness = (components: readonly ComponentReport[]): ReadinessState => {
  const down = components.filter((component) => !component.up);
  if (down.length === 0) return 'ready';
  return down.some((component) => component.critical) ? 'unavailable' : 'degraded';
};

export async function checkReadiness(
  deps: CheckReadinessDeps,
  input: CheckReadinessInput
): Promise<ReadinessReport> {
  const { checks, timeoutMs, clock = () => Date.now() } = deps;
  const { checkedAt, uptimeSeconds, version } = input;

  const components = await Promise.all(
    checks.map((check) => inspectDependency(check, timeoutMs, clock))
  );

  return {
    state: summarizeReadiness(components),
    checkedAt,
    uptimeSeconds,
    ...(version !== undefined && { version }),
    components,
  };
}
