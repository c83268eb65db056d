import { CollectorSupervisor } from '../../src/collector/supervisor';
import { NodeRecord } from '../../src/nodes/repository';
import { telemetryBus } from '../../src/telemetry';
import { trackingFactory } from '../utils/fakeWorker';

const node = (id: string, overrides: Partial<NodeRecord> = {}): NodeRecord => ({
  id,
  name: `gpu-${id}`,
  host: '10.0.0.5',
  port: 6767,
  enabled: true,
  createdAt: new Date('2026-03-01T00:00:00.000Z'),
  lastSeen: null,
  ...overrides,
});

const setup = () => {
  const { created, factory } = trackingFactory();
  const supervisor = new CollectorSupervisor(factory);
  const live = () => created.filter((worker) => worker.state === 'running');
  return { supervisor, created, live };
};

describe('CollectorSupervisor', () => {
  it('starts one worker per node and ignores repeated starts', async () => {
    const { supervisor, created } = setup();

    expect(await supervisor.start(node('a'))).toBe(true);
    expect(await supervisor.start(node('a'))).toBe(false);

    expect(created).toHaveLength(1);
    expect(supervisor.has('a')).toBe(true);
    expect(supervisor.size).toBe(1);
  });

  it('stops and forgets a worker', async () => {
    const { supervisor, created } = setup();
    await supervisor.start(node('a'));

    expect(await supervisor.stop('a')).toBe(true);
    expect(await supervisor.stop('a')).toBe(false);

    expect(created[0]?.state).toBe('stopped');
    expect(supervisor.size).toBe(0);
  });

  it('restart swaps in a worker for the new address', async () => {
    const { supervisor, created } = setup();
    await supervisor.start(node('a'));

    await supervisor.restart(node('a', { host: '10.0.0.9' }));

    expect(created.map((worker) => [worker.node.host, worker.state])).toEqual([
      ['10.0.0.5', 'stopped'],
      ['10.0.0.9', 'running'],
    ]);
    expect(supervisor.list().map((status) => status.host)).toEqual(['10.0.0.9']);
  });

  it('initializes from a registry', async () => {
    const { supervisor } = setup();
    await supervisor.init({ listEnabled: async () => [node('a'), node('b')] });
    expect(supervisor.nodeIds().sort()).toEqual(['a', 'b']);
  });

  it('reconciles against the desired set', async () => {
    const { supervisor } = setup();
    await supervisor.start(node('a'));
    await supervisor.start(node('b'));
    await supervisor.start(node('c'));

    const result = await supervisor.reconcile([
      node('a'),
      node('b', { port: 7000 }),
      node('c', { enabled: false }),
      node('d'),
    ]);

    expect(result).toEqual({ started: ['d'], stopped: ['c'], restarted: ['b'] });
    expect(supervisor.nodeIds().sort()).toEqual(['a', 'b', 'd']);
    expect(supervisor.list().find((status) => status.nodeId === 'b')?.port).toBe(7000);
  });

  it('keeps at most one live worker per node under concurrent changes', async () => {
    const { supervisor, live } = setup();
    const ops: Array<Promise<unknown>> = [];
    for (let round = 0; round < 5; round += 1) {
      for (const id of ['a', 'b']) {
        ops.push(supervisor.start(node(id)));
        ops.push(supervisor.restart(node(id, { port: 6000 + round })));
        ops.push(supervisor.start(node(id)));
        if (round % 2) ops.push(supervisor.stop(id));
      }
    }
    await Promise.all(ops);

    const running = live();
    const ids = running.map((worker) => worker.node.id);
    expect(new Set(ids).size).toBe(ids.length);
    expect(ids.sort()).toEqual(supervisor.nodeIds().sort());
  });

  it('stops every worker on stopAll', async () => {
    const { supervisor, created, live } = setup();
    await supervisor.start(node('a'));
    await supervisor.start(node('b'));

    await supervisor.stopAll();

    expect(supervisor.size).toBe(0);
    expect(live()).toHaveLength(0);
    expect(created.every((worker) => worker.state === 'stopped')).toBe(true);
  });

  it('publishes worker lifecycle events', async () => {
    const { supervisor } = setup();
    const events: string[] = [];
    const onStart = (event: { payload: { address: string } }) => events.push(`start ${event.payload.address}`);
    const onStop = (event: { payload: { nodeId: string; settled: boolean } }) =>
      events.push(`stop ${event.payload.nodeId} ${event.payload.settled}`);
    telemetryBus.on('collector.worker.started', onStart);
    telemetryBus.on('collector.worker.stopped', onStop);
    try {
      await supervisor.start(node('a'));
      await supervisor.stop('a');
    } finally {
      telemetryBus.off('collector.worker.started', onStart);
      telemetryBus.off('collector.worker.stopped', onStop);
    }
    expect(events).toEqual(['start 10.0.0.5:6767', 'stop a true']);
  });
});
