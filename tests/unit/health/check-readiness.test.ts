import { describe, expect, it } from 'vitest';

import {
  checkReadiness,
  inspectDependency,
  summarizeReadiness,
  type ComponentReport,
} from '@/modules/health/index.js';

import {
  makeDependencyCheck,
  makeDownDependency,
  makeSlowDependency,
  makeThrowingDependency,
} from '../../fixtures/builders.js';

const report = (overrides: Partial<ComponentReport> = {}): ComponentReport => ({
  component: 'database',
  up: true,
  critical: true,
  latencyMs: 1,
  ...overrides,
});

/** Returns the given instants in order, then the last one */
const steppingClock = (...instants: number[]): (() => number) => {
  let index = 0;
  return () => instants[Math.min(index++, instants.length - 1)] ?? 0;
};

describe('summarizeReadiness', () => {
  it('is ready when every component is up, or there are none', () => {
    expect(summarizeReadiness([report(), report({ component: 'cache', critical: false })])).toBe(
      'ready'
    );
    expect(summarizeReadiness([])).toBe('ready');
  });

  it('is degraded when only optional components are down', () => {
    expect(
      summarizeReadiness([report(), report({ component: 'cache', up: false, critical: false })])
    ).toBe('degraded');
  });

  it('is unavailable when a critical component is down', () => {
    expect(
      summarizeReadiness([
        report({ up: false }),
        report({ component: 'cache', up: false, critical: false }),
      ])
    ).toBe('unavailable');
  });
});

describe('inspectDependency', () => {
  it('measures the round trip with the clock', async () => {
    const result = await inspectDependency(
      makeDependencyCheck({ component: 'database' }),
      1000,
      steppingClock(100, 104)
    );

    expect(result).toEqual({ component: 'database', critical: true, latencyMs: 4, up: true });
  });

  it('keeps the reason a dependency gives', async () => {
    const result = await inspectDependency(
      makeDownDependency('cache', 'ECONNREFUSED', false),
      1000,
      steppingClock(0, 2)
    );

    expect(result).toEqual({
      component: 'cache',
      critical: false,
      latencyMs: 2,
      up: false,
      error: 'ECONNREFUSED',
    });
  });

  it('reports a throwing dependency under its own name', async () => {
    const result = await inspectDependency(
      makeThrowingDependency('database', 'Connection terminated'),
      1000,
      steppingClock(0)
    );

    expect(result).toMatchObject({
      component: 'database',
      up: false,
      critical: true,
      error: 'Connection terminated',
    });
  });

  it('gives up after the timeout', async () => {
    const result = await inspectDependency(
      makeSlowDependency(2000, { component: 'database' }),
      50,
      () => Date.now()
    );

    expect(result).toMatchObject({
      up: false,
      error: 'No answer from database within 50ms',
    });
    expect(result.latencyMs).toBeLessThan(1000);
  });
});

describe('checkReadiness', () => {
  const input = { checkedAt: '2024-07-01T12:00:00.000Z', uptimeSeconds: 42 };

  it('reports every component with the process details', async () => {
    const result = await checkReadiness(
      {
        checks: [
          makeDependencyCheck({ component: 'database' }),
          makeDownDependency('cache', 'ECONNREFUSED', false),
        ],
        timeoutMs: 1000,
        clock: () => 7,
      },
      { ...input, version: '1.2.0' }
    );

    expect(result).toEqual({
      state: 'degraded',
      checkedAt: '2024-07-01T12:00:00.000Z',
      uptimeSeconds: 42,
      version: '1.2.0',
      components: [
        { component: 'database', critical: true, latencyMs: 0, up: true },
        { component: 'cache', critical: false, latencyMs: 0, up: false, error: 'ECONNREFUSED' },
      ],
    });
  });

  it('omits the version when it is unknown', async () => {
    const result = await checkReadiness({ checks: [], timeoutMs: 1000 }, input);

    expect(result).not.toHaveProperty('version');
    expect(result.state).toBe('ready');
  });

  it('pings the dependencies concurrently', async () => {
    const started = Date.now();

    await checkReadiness(
      {
        checks: [
          makeSlowDependency(100, { component: 'a' }),
          makeSlowDependency(100, { component: 'b' }),
          makeSlowDependency(100, { component: 'c' }),
        ],
        timeoutMs: 1000,
      },
      input
    );

    expect(Date.now() - started).toBeLessThan(250);
  });
});
