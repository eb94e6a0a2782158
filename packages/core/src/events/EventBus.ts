import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type {
  Alert,
  EventBusMessage,
  MonitorConfig,
  Sample,
  SinkWriteError,
} from '@hostwatch/shared';
import type { CycleReport, SchedulerState } from '../scheduler/Scheduler.js';

type EventMap = {
  'monitor:start': { config: MonitorConfig };
  'monitor:stop': undefined;
  'cycle:start': { cycle: number; startedAt: Date };
  'cycle:complete': CycleReport;
  'sample:collected': Sample;
  'source:fail': { source: string; error: string };
  'alert:raised': Alert;
  'alert:suppressed': Alert;
  'sink:error': SinkWriteError;
  'state:change': { from: SchedulerState; to: SchedulerState };
};

export type EventName = keyof EventMap;

export class EventBus {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    this.emitter.emit(event, data);
    // Also emit a generic message for subscribers that want everything
    const message: EventBusMessage = {
      id: nanoid(),
      type: event,
      source: 'core',
      timestamp: new Date(),
      data,
    };
    this.emitter.emit('*', message);
  }

  on<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.on(event, handler);
  }

  once<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.once(event, handler);
  }

  off<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.off(event, handler);
  }

  onAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.on('*', handler);
  }

  offAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.off('*', handler);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
