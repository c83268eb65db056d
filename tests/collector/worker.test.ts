import { SnapshotSource } from '../../src/collector/fetcher';
import { NodeWorker, nextDelaySeconds } from '../../src/collector/worker';
import { FetchError } from '../../src/errors';
import { SnapshotIngestor } from '../../src/snapshots/ingest';
import { RawSnapshot } from '../../src/snapshots/types';
import { rawSnapshot } from '../utils/fixtures';
import { RecordingStore } from '../utils/recordingStore';

const NODE = { id: 'node-a', name: 'gpu0', host: '10.0.0.5', port: 6767 };

class ScriptedSource implements SnapshotSource {
  calls = 0;
  failing = false;

  async fetch(): Promise<RawSnapshot> {
    this.calls += 1;
    if (this.failing) throw new FetchError('http://10.0.0.5:6767/vram', 'HTTP 500', { status: 500 });
    return rawSnapshot({ usedBytes: this.calls });
  }
}

/** Never settles on its own; rejects only if the worker aborts it. */
class HangingSource implements SnapshotSource {
  constructor(private honorAbort: boolean) {}

  fetch(_node: unknown, signal?: AbortSignal): Promise<RawSnapshot> {
    return new Promise((_resolve, reject) => {
      if (this.honorAbort) {
        signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }
    });
  }
}

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('nextDelaySeconds', () => {
  const policy = { intervalSeconds: 5, errorThreshold: 5, maxBackoffSeconds: 60 };

  it('keeps the base interval up to the threshold', () => {
    expect(nextDelaySeconds(0, policy)).toBe(5);
    expect(nextDelaySeconds(5, policy)).toBe(5);
  });

  it('doubles the interval past the threshold, capped', () => {
    expect(nextDelaySeconds(6, policy)).toBe(10);
    expect(nextDelaySeconds(6, { ...policy, intervalSeconds: 40 })).toBe(60);
  });
});

describe('NodeWorker', () => {
  it('backs off after the sixth consecutive failure and recovers on success', async () => {
    const source = new ScriptedSource();
    source.failing = true;
    const worker = new NodeWorker(NODE, source, new SnapshotIngestor(new RecordingStore()), { intervalSeconds: 5 });

    const delays: Array<number | null> = [];
    for (let i = 0; i < 6; i += 1) {
      expect(await worker.runCycle()).toBe('fetch_failed');
      delays.push(worker.lastDelaySeconds);
    }
    expect(delays).toEqual([5, 5, 5, 5, 5, 10]);
    expect(worker.errorCount).toBe(6);
    expect(worker.lastError).toBe('Fetch from http://10.0.0.5:6767/vram failed: HTTP 500');

    source.failing = false;
    expect(await worker.runCycle()).toBe('committed');
    expect(worker.errorCount).toBe(0);
    expect(worker.lastDelaySeconds).toBe(5);
    expect(worker.lastError).toBeNull();
  });

  it('caps the backoff at the maximum', async () => {
    const source = new ScriptedSource();
    source.failing = true;
    const worker = new NodeWorker(NODE, source, new SnapshotIngestor(new RecordingStore()), { intervalSeconds: 40 });
    for (let i = 0; i < 6; i += 1) await worker.runCycle();
    expect(worker.lastDelaySeconds).toBe(60);
  });

  it('counts a failed commit as an error without stopping', async () => {
    const store = new RecordingStore();
    store.failures = 1;
    const worker = new NodeWorker(NODE, new ScriptedSource(), new SnapshotIngestor(store));

    expect(await worker.runCycle()).toBe('commit_failed');
    expect(await worker.runCycle()).toBe('committed');
    expect(worker.cycleCount).toBe(2);
    expect(worker.snapshotCount).toBe(1);
    expect(store.commits).toHaveLength(1);
  });

  it('runs its loop until stopped and commits in fetch order', async () => {
    const store = new RecordingStore();
    const worker = new NodeWorker(NODE, new ScriptedSource(), new SnapshotIngestor(store), {
      intervalSeconds: 0.005,
    });

    worker.start();
    expect(worker.state).toBe('running');
    await wait(50);
    const settled = await worker.stop(1000);

    expect(settled).toBe(true);
    expect(worker.state).toBe('stopped');
    expect(worker.snapshotCount).toBeGreaterThan(0);
    expect(worker.snapshotCount).toBeLessThanOrEqual(worker.cycleCount);
    const used = store.commits.map((commit) => commit.raw.usedBytes);
    expect(used).toEqual([...used].sort((a, b) => a - b));
    const times = store.commits.map((commit) => commit.timestamp.getTime());
    expect(times).toEqual([...times].sort((a, b) => a - b));
  });

  it('interrupts the sleep between cycles on stop', async () => {
    const worker = new NodeWorker(NODE, new ScriptedSource(), new SnapshotIngestor(new RecordingStore()), {
      intervalSeconds: 3600,
    });
    worker.start();
    await wait(10);

    await expect(worker.stop(1000)).resolves.toBe(true);
    expect(worker.cycleCount).toBe(1);
  });

  it('settles when the in-flight fetch honours the abort', async () => {
    const worker = new NodeWorker(NODE, new HangingSource(true), new SnapshotIngestor(new RecordingStore()));
    worker.start();
    await wait(5);

    await expect(worker.stop(1000)).resolves.toBe(true);
    expect(worker.snapshotCount).toBe(0);
  });

  it('abandons a cycle that outlives the grace period', async () => {
    const worker = new NodeWorker(NODE, new HangingSource(false), new SnapshotIngestor(new RecordingStore()));
    worker.start();
    await wait(5);

    await expect(worker.stop(20)).resolves.toBe(false);
    expect(worker.state).toBe('stopped');
    expect(worker.status()).toMatchObject({ nodeId: 'node-a', state: 'stopped', snapshotCount: 0 });
  });

  it('stopping an idle worker needs no loop', async () => {
    const worker = new NodeWorker(NODE, new ScriptedSource(), new SnapshotIngestor(new RecordingStore()));
    await expect(worker.stop()).resolves.toBe(true);
    expect(worker.state).toBe('stopped');
  });
});
