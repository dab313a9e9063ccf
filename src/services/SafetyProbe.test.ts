import { beforeEach, describe, expect, it } from 'vitest';
import { defaultConfig, type AppConfig } from '@/config';
import { createTestUnits, range } from '@/test/factories/workUnitFactory';
import { createMockSessionFactory, type MockSessionFactory } from '@/test/mocks/MockTTSService';
import { createMockCheckpointHandler, type MockCheckpointHandler } from '@/test/mocks/MockCheckpointHandler';
import { createMemoryAudioSink } from '@/test/mocks/MemoryAudioSink';
import { createMemoryManifest, type MemoryManifest } from '@/test/mocks/MemoryManifest';
import { createMockLogger, type MockLogger } from '@/test/mocks/MockLogger';
import { ParallelCoordinator } from './ParallelCoordinator';
import { SafetyProbe } from './SafetyProbe';

describe('SafetyProbe', () => {
  let factory: MockSessionFactory;
  let handler: MockCheckpointHandler;
  let manifest: MemoryManifest;
  let logger: MockLogger;

  const config = (safetyProbe: Partial<AppConfig['safetyProbe']> = {}): AppConfig => ({
    ...defaultConfig,
    worker: { interRequestDelayMs: 0, maxAttempts: 3, retryBackoffMs: 1 },
    safetyProbe: { ...defaultConfig.safetyProbe, ...safetyProbe },
  });

  beforeEach(() => {
    factory = createMockSessionFactory();
    handler = createMockCheckpointHandler();
    manifest = createMemoryManifest();
    logger = createMockLogger();
  });

  const createProbe = (probeConfig: AppConfig = config()) =>
    new SafetyProbe({
      config: probeConfig,
      logger,
      coordinator: new ParallelCoordinator({
        config: probeConfig,
        voice: 'en-US-TestVoice',
        sessionFactory: factory,
        sink: createMemoryAudioSink(),
        manifest,
        checkpointHandler: handler,
        logger,
        writer: null,
      }),
    });

  it('passes when both workers get through their share', async () => {
    const result = await createProbe().run(createTestUnits(300));

    expect(result.passed).toBe(true);
    expect(result.unitsProbed).toBe(100);
    expect(result.summary?.workerCount).toBe(2);
    expect(factory.createSession).toHaveBeenCalledTimes(2);
  });

  it('keeps the probed work', async () => {
    await createProbe().run(createTestUnits(300));

    expect([...manifest.completed].sort((a, b) => a - b)).toEqual(range(0, 100));
  });

  it('fails on a hard limit well below the checkpoint threshold', async () => {
    factory.setPlanner(({ sessionSuccesses }) => (sessionSuccesses >= 10 ? 'hard-limit' : 'ok'));
    const result = await createProbe().run(createTestUnits(300));

    expect(result.passed).toBe(false);
    expect(result.error?.code).toBe('SAFETY_PROBE_FAILED');
    expect(result.error?.message).toMatch(
      /^Worker #[12] hit the remote limit after 10 requests, below the checkpoint threshold of 55; the limit is enforced above session level$/,
    );
    expect(result.summary?.workersCancelled).toBe(2);
  });

  it('accepts a hard limit close to the threshold', async () => {
    // One worker with 54 units: the limit arrives after 52 requests, inside the margin
    factory.setPlanner(({ call, sessionSuccesses }) => (call === 1 && sessionSuccesses === 52 ? 'hard-limit' : 'ok'));
    const result = await createProbe(config({ workers: 1, units: 54 })).run(createTestUnits(300));

    expect(result.passed).toBe(true);
    expect(handler.requests.map((r) => r.reason)).toEqual(['hard-limit']);
    expect(result.summary?.completed).toEqual(range(0, 54));
  });

  it('fails when a probe worker fails', async () => {
    factory.planUnit(3, 'crash');
    const result = await createProbe().run(createTestUnits(300));

    expect(result.passed).toBe(false);
    expect(result.error?.message).toBe('1 of 2 probe workers failed');
  });

  it('fails without running when too few units are pending', async () => {
    const result = await createProbe().run(createTestUnits(5));

    expect(result).toMatchObject({ passed: false, unitsProbed: 0, summary: null });
    expect(result.error?.message).toBe('Only 5 units pending; the safety probe needs at least 10');
    expect(factory.createSession).not.toHaveBeenCalled();
    expect(logger.hasMessage('Safety probe failed: Only 5 units pending')).toBe(true);
  });

  it('rejects when the run is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createProbe().run(createTestUnits(300), controller.signal)).rejects.toMatchObject({
      code: 'CANCELLED',
      message: 'Safety probe cancelled',
    });
  });
});
