import { describe, it, expect, afterEach, vi } from 'vitest';
import { Config } from '../src/config/config';
import { BackupEvent, EventChannel } from '../src/scheduler/eventChannel';
import { Orchestrator } from '../src/scheduler/orchestrator';
import { FakeRunner, ManualTickers, MemoryConfigStore, settle, testConfig } from './helpers/fakes';

describe('Orchestrator', () => {
  let orchestrator: Orchestrator | null = null;
  let runner: FakeRunner;
  let store: MemoryConfigStore;
  let events: EventChannel<BackupEvent>;
  let tickers: ManualTickers;

  function setup(config: Config = testConfig()): Orchestrator {
    runner = new FakeRunner();
    store = new MemoryConfigStore(config);
    events = new EventChannel<BackupEvent>(8);
    tickers = new ManualTickers();
    orchestrator = new Orchestrator({
      store,
      runner,
      events,
      initialConfig: config,
      tickerFactory: tickers.factory,
    });
    orchestrator.start();
    return orchestrator;
  }

  afterEach(async () => {
    vi.restoreAllMocks();
    runner.finishAll();
    await orchestrator?.shutdown();
    orchestrator = null;
  });

  it('should arm a ticker for the configured interval', () => {
    const orch = setup(testConfig({ IntervalMinutes: 5 }));

    expect(tickers.created).toHaveLength(1);
    expect(tickers.created[0].periodMs).toBe(5 * 60 * 1000);
    expect(orch.state).toBe('idle');
  });

  it('should treat a negative interval as one minute', () => {
    setup(testConfig({ IntervalMinutes: -4 }));

    expect(tickers.created[0].periodMs).toBe(60 * 1000);
  });

  it('should run a pass on every tick', async () => {
    const orch = setup();

    tickers.created[0].fire();
    await vi.waitFor(() => expect(runner.calls).toHaveLength(1));
    expect(orch.state).toBe('running');

    runner.calls[0].finish();
    await orch.whenIdle();
    expect(orch.getStatus().lastRun?.reason).toBe('ticker');

    tickers.created[0].fire();
    await vi.waitFor(() => expect(runner.calls).toHaveLength(2));
  });

  it('should not tick when disabled but still honor run-now', async () => {
    const orch = setup(testConfig({ IntervalMinutes: 0 }));

    expect(tickers.created).toHaveLength(0);
    expect(orch.state).toBe('disabled');

    events.trySend({ type: 'run-now' });
    await vi.waitFor(() => expect(runner.calls).toHaveLength(1));

    runner.calls[0].finish();
    await orch.whenIdle();
    expect(orch.getStatus().lastRun?.reason).toBe('run-now');
    expect(orch.state).toBe('disabled');
  });

  it('should drop ticks and run-now requests while a pass is running', async () => {
    const orch = setup();

    events.trySend({ type: 'run-now' });
    await vi.waitFor(() => expect(runner.calls).toHaveLength(1));

    tickers.created[0].fire();
    events.trySend({ type: 'run-now' });
    await vi.waitFor(() => expect(events.size).toBe(0));
    await settle();
    expect(runner.calls).toHaveLength(1);

    runner.calls[0].finish();
    await orch.whenIdle();

    events.trySend({ type: 'run-now' });
    await vi.waitFor(() => expect(runner.calls).toHaveLength(2));
  });

  it('should keep a single channel subscription across tick-driven wake-ups', async () => {
    const readable = vi.spyOn(EventChannel.prototype, 'readable');
    const orch = setup();

    for (let pass = 1; pass <= 5; pass++) {
      tickers.created[0].fire();
      await vi.waitFor(() => expect(runner.calls).toHaveLength(pass));
      runner.calls[pass - 1].finish();
      await orch.whenIdle();
    }

    expect(readable).toHaveBeenCalledTimes(1);

    events.trySend({ type: 'run-now' });
    await vi.waitFor(() => expect(runner.calls).toHaveLength(6));
  });

  it('should use a fresh config snapshot for each pass', async () => {
    setup();
    store.config = testConfig({ Retention: 7 });

    events.trySend({ type: 'run-now' });
    await vi.waitFor(() => expect(runner.calls).toHaveLength(1));

    expect(runner.calls[0].snapshot.Retention).toBe(7);
  });

  it('should fall back to the last good config when a reload fails', async () => {
    const initial = testConfig({ Retention: 4 });
    setup(initial);
    store.failLoads = true;

    events.trySend({ type: 'run-now' });
    await vi.waitFor(() => expect(runner.calls).toHaveLength(1));

    expect(runner.calls[0].snapshot).toEqual(initial);
  });

  it('should re-arm the ticker when the interval changes', async () => {
    const orch = setup(testConfig({ IntervalMinutes: 5 }));
    const first = tickers.created[0];

    store.config = testConfig({ IntervalMinutes: 10 });
    events.trySend({ type: 'config-changed' });
    await vi.waitFor(() => expect(tickers.created).toHaveLength(2));

    expect(first.stopped).toBe(true);
    expect(tickers.active.map((t) => t.periodMs)).toEqual([10 * 60 * 1000]);
    expect(orch.getStatus().intervalMinutes).toBe(10);

    // A tick from the replaced ticker is ignored
    first.fire();
    await settle();
    expect(runner.calls).toHaveLength(0);
  });

  it('should disable and re-enable the ticker through config changes', async () => {
    const orch = setup(testConfig({ IntervalMinutes: 5 }));

    store.config = testConfig({ IntervalMinutes: 0 });
    events.trySend({ type: 'config-changed' });
    await vi.waitFor(() => expect(orch.state).toBe('disabled'));
    expect(tickers.active).toHaveLength(0);

    store.config = testConfig({ IntervalMinutes: 3 });
    events.trySend({ type: 'config-changed' });
    await vi.waitFor(() => expect(orch.state).toBe('idle'));
    expect(tickers.active.map((t) => t.periodMs)).toEqual([3 * 60 * 1000]);
  });

  it('should keep the ticker when the interval is unchanged', async () => {
    setup(testConfig({ IntervalMinutes: 5 }));

    store.config = testConfig({ IntervalMinutes: 5, Retention: 9 });
    events.trySend({ type: 'config-changed' });
    await vi.waitFor(() => expect(store.loads).toBe(1));
    await settle();

    expect(tickers.created).toHaveLength(1);
    expect(tickers.created[0].stopped).toBe(false);
  });

  it('should keep the schedule when a config reload fails', async () => {
    const orch = setup(testConfig({ IntervalMinutes: 5 }));
    store.failLoads = true;

    events.trySend({ type: 'config-changed' });
    await vi.waitFor(() => expect(store.loads).toBe(1));
    await settle();

    expect(tickers.active).toHaveLength(1);
    expect(orch.getStatus().intervalMinutes).toBe(5);
  });

  it('should cancel the active pass on shutdown and wait for it', async () => {
    const orch = setup();
    events.trySend({ type: 'run-now' });
    await vi.waitFor(() => expect(runner.calls).toHaveLength(1));

    let stopped = false;
    const stopping = orch.shutdown().then(() => {
      stopped = true;
    });

    expect(runner.calls[0].signal?.aborted).toBe(true);
    await settle();
    expect(stopped).toBe(false);

    runner.calls[0].finish();
    await stopping;

    expect(orch.state).toBe('stopped');
    expect(tickers.active).toHaveLength(0);

    tickers.created[0].fire();
    events.trySend({ type: 'run-now' });
    await settle();
    expect(runner.calls).toHaveLength(1);
  });

  it('should summarize the last pass in its status', async () => {
    const orch = setup();
    events.trySend({ type: 'run-now' });
    await vi.waitFor(() => expect(runner.calls).toHaveLength(1));

    runner.calls[0].finish([
      {
        site: 'Shop',
        status: 'ok',
        archive: { site: 'Shop', path: '/b/Shop/a.zip', bytes: 3, retention: { kept: 2, deleted: ['old.zip'], failures: [] } },
      },
      { site: 'Blog', status: 'skipped' },
    ]);
    await orch.whenIdle();

    const { lastRun } = orch.getStatus();
    expect(lastRun?.ok).toBe(1);
    expect(lastRun?.failed).toBe(0);
    expect(lastRun?.skipped).toBe(1);
    expect(lastRun?.sites).toEqual([
      { site: 'Shop', status: 'ok', path: '/b/Shop/a.zip', bytes: 3, deleted: 1 },
      { site: 'Blog', status: 'skipped' },
    ]);
  });
});
