import { NoDataError, NotFoundError, UnknownMetricError } from '../../src/errors';
import { NodeRepository } from '../../src/nodes/repository';
import { SnapshotIngestor } from '../../src/snapshots/ingest';
import { PgSnapshotStore } from '../../src/snapshots/store';
import { METRIC_NAMES, TimeseriesService, downsample } from '../../src/timeseries';
import { rawSnapshot } from '../utils/fixtures';
import { MockPool } from '../utils/mockPool';

const T0 = new Date('2026-03-01T12:00:00.000Z');
const at = (seconds: number) => new Date(T0.getTime() + seconds * 1000);

const setup = async () => {
  const pool = new MockPool();
  const repo = new NodeRepository(pool);
  const node = await repo.create({ name: 'gpu0', host: '10.0.0.5' });
  const store = new PgSnapshotStore(pool);
  const ingestor = new SnapshotIngestor(store);
  return { repo, node, store, ingestor, service: new TimeseriesService(store, 1000) };
};

describe('downsample', () => {
  const points = [0, 1, 2, 3, 7].map((s) => ({ timestamp: at(s), value: s }));

  it('keeps the first point and then points at least interval apart', () => {
    expect(downsample(points, 2).map((p) => p.value)).toEqual([0, 2, 7]);
    expect(downsample(points, 5).map((p) => p.value)).toEqual([0, 7]);
  });

  it('returns the input without an interval', () => {
    expect(downsample(points)).toBe(points);
    expect(downsample([], 3)).toEqual([]);
  });
});

describe('TimeseriesService', () => {
  it('extracts a metric over a range with down-sampling', async () => {
    const { node, ingestor, service } = await setup();
    await ingestor.ingest(node.id, rawSnapshot({ usedBytes: 100 }), at(0));
    await ingestor.ingest(node.id, rawSnapshot({ usedBytes: 110 }), at(1));
    await ingestor.ingest(node.id, rawSnapshot({ usedBytes: 120 }), at(2));

    const points = await service.range('used_bytes', at(0), at(2), { interval: 2 });

    expect(points).toEqual([
      { timestamp: at(0), value: 100 },
      { timestamp: at(2), value: 120 },
    ]);
  });

  it('reads derived metrics and filters by node', async () => {
    const { repo, node, ingestor, service } = await setup();
    const other = await repo.create({ name: 'gpu1', host: '10.0.0.6' });
    await ingestor.ingest(node.id, rawSnapshot({ allocatedBlocks: 4, utilizedBlocks: 1 }), at(0));
    await ingestor.ingest(other.id, rawSnapshot({ allocatedBlocks: 4, utilizedBlocks: 2 }), at(1));

    const points = await service.range('kv_cache_utilization', at(0), at(10), { nodeId: other.id });

    expect(points).toEqual([{ timestamp: at(1), value: 50 }]);
  });

  it('rejects an unknown metric and lists the supported ones', async () => {
    const { service } = await setup();
    const error = await service.range('gpu_temperature', at(0), at(1)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UnknownMetricError);
    expect(error).toMatchObject({ statusCode: 400, supported: METRIC_NAMES });
    expect(METRIC_NAMES).toHaveLength(16);
  });

  it('summarizes or reports no data', async () => {
    const { node, ingestor, service } = await setup();
    await expect(service.summary()).rejects.toBeInstanceOf(NoDataError);

    await ingestor.ingest(node.id, rawSnapshot({ usedBytes: 100 }), at(0));
    await ingestor.ingest(node.id, rawSnapshot({ usedBytes: 300 }), at(30));

    const summary = await service.summary(at(0));
    expect(summary).toMatchObject({ totalSnapshots: 2, avgUsedBytes: 200, timeRangeEnd: at(30) });
  });

  it('returns the latest snapshot or NoDataError', async () => {
    const { node, ingestor, service } = await setup();
    await expect(service.latest()).rejects.toBeInstanceOf(NoDataError);

    await ingestor.ingest(node.id, rawSnapshot({ usedBytes: 1 }), at(0));
    await ingestor.ingest(node.id, rawSnapshot({ usedBytes: 2 }), at(5));

    expect((await service.latest(node.id)).usedBytes).toBe(2);
  });

  it('groups process history by pid with the first name seen', async () => {
    const { node, ingestor, service } = await setup();
    await ingestor.ingest(
      node.id,
      rawSnapshot({
        processes: [
          { pid: 1, name: 'trainer', usedBytes: 10, reservedBytes: 20 },
          { pid: 2, name: 'server', usedBytes: 5, reservedBytes: 5 },
        ],
      }),
      at(0),
    );
    await ingestor.ingest(
      node.id,
      rawSnapshot({ processes: [{ pid: 1, name: 'trainer-renamed', usedBytes: 15, reservedBytes: 20 }] }),
      at(10),
    );

    const history = await service.processHistory(at(0));

    expect(history).toEqual([
      {
        pid: 1,
        name: 'trainer',
        history: [
          { timestamp: at(0), usedBytes: 10, reservedBytes: 20 },
          { timestamp: at(10), usedBytes: 15, reservedBytes: 20 },
        ],
      },
      { pid: 2, name: 'server', history: [{ timestamp: at(0), usedBytes: 5, reservedBytes: 5 }] },
    ]);
  });

  it('pages snapshots newest first and clamps the limit', async () => {
    const { node, store, ingestor, service } = await setup();
    for (let i = 0; i < 3; i += 1) {
      await ingestor.ingest(node.id, rawSnapshot({ usedBytes: i }), at(i));
    }

    const page = await service.listSnapshots({ limit: 2, offset: 1 });
    expect(page.map((s) => s.usedBytes)).toEqual([1, 0]);

    const listPage = jest.spyOn(store, 'listPage');
    await service.listSnapshots({ limit: 5000, offset: -3 });
    expect(listPage).toHaveBeenCalledWith(expect.objectContaining({ limit: 1000, offset: 0 }));
  });

  it('returns snapshot detail or NotFoundError', async () => {
    const { node, ingestor, service } = await setup();
    const commit = await ingestor.ingest(node.id, rawSnapshot(), at(0));

    expect((await service.snapshotDetail(commit.id)).threads).toEqual([
      { threadId: 1, allocatedBytes: 128, state: 'running' },
    ]);
    await expect(service.snapshotDetail('00000000-0000-4000-8000-000000000000')).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it('purges by age in days', async () => {
    const { node, ingestor, service } = await setup();
    const now = new Date('2026-03-31T12:00:00.000Z');
    await ingestor.ingest(node.id, rawSnapshot(), new Date('2026-02-01T00:00:00.000Z'));
    await ingestor.ingest(node.id, rawSnapshot(), new Date('2026-03-30T00:00:00.000Z'));

    expect(await service.purge(30, now)).toBe(1);
    expect((await service.latest()).timestamp).toEqual(new Date('2026-03-30T00:00:00.000Z'));
  });
});
