import { EventEmitter } from 'eventemitter3';
import type { MindgateEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof MindgateEvents>(event: K, listener: (data: MindgateEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof MindgateEvents>(event: K, listener: (data: MindgateEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof MindgateEvents>(event: K, listener: (data: MindgateEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof MindgateEvents>(event: K, data: MindgateEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
