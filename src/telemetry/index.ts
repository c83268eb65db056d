import pino from 'pino';
import EventEmitter from 'eventemitter3';
import config from '../config';

export const logger = pino({
  level: config.logLevel,
  transport:
    config.env === 'production' || config.env === 'test'
      ? undefined
      : {
          target: 'pino-pretty',
          options: { colorize: true },
        },
});

export type MetricSample = Record<string, number>;

export class MetricCollector extends EventEmitter {
  private gauges: Record<string, number> = {};

  setGauge(name: string, value: number) {
    this.gauges[name] = value;
    this.emit('metric', { type: 'gauge', name, value, ts: Date.now() });
  }

  incrementCounter(name: string, delta = 1) {
    this.gauges[name] = (this.gauges[name] || 0) + delta;
    this.emit('metric', { type: 'counter', name, value: this.gauges[name], ts: Date.now() });
  }

  snapshot(): MetricSample {
    return { ...this.gauges };
  }
}

export const metrics = new MetricCollector();

export type TelemetryEvent =
  | { type: 'snapshot.committed'; payload: { nodeId: string; snapshotId: string; timestamp: string } }
  | { type: 'collector.worker.started'; payload: { nodeId: string; address: string } }
  | { type: 'collector.worker.stopped'; payload: { nodeId: string; settled: boolean } }
  | { type: 'node.registered'; payload: { nodeId: string; name: string } }
  | { type: 'node.removed'; payload: { nodeId: string; name: string } };

export class TelemetryBus extends EventEmitter {
  publish(event: TelemetryEvent) {
    this.emit(event.type, event);
  }
}

export const telemetryBus = new TelemetryBus();
