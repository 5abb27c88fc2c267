import { EventEmitter } from 'eventemitter3';
import type { SessionEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof SessionEvents>(event: K, listener: (data: SessionEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof SessionEvents>(event: K, listener: (data: SessionEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof SessionEvents>(event: K, listener: (data: SessionEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof SessionEvents>(event: K, data: SessionEvents[K]): void {
    this.emitter.emit(event, data);
  }
}
