import type { Result } from 'neverthrow';

/**
 * A dependency the service needs to answer requests.
 *
 * `ping` resolves to an Err with the reason when the dependency does not
 * answer. It may also throw; the readiness check records that as down.
 */
export interface DependencyCheck {
  component: string;
  /** A critical dependency that is down makes the service unavailable */
  critical: boolean;
  ping: () => Promise<Result<void, string>>;
}
