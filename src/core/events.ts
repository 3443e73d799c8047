import { EventEmitter } from 'eventemitter3';
import type { NetfuseEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof NetfuseEvents>(event: K, listener: (data: NetfuseEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof NetfuseEvents>(event: K, listener: (data: NetfuseEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof NetfuseEvents>(event: K, listener: (data: NetfuseEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof NetfuseEvents>(event: K, data: NetfuseEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
