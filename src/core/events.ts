import { EventEmitter } from 'eventemitter3';
import type { RteEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof RteEvents>(event: K, listener: (data: RteEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof RteEvents>(event: K, listener: (data: RteEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof RteEvents>(event: K, listener: (data: RteEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof RteEvents>(event: K, data: RteEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
