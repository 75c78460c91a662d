import { EventEmitter } from 'eventemitter3';
import type { StipulateEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof StipulateEvents>(event: K, listener: (data: StipulateEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof StipulateEvents>(event: K, listener: (data: StipulateEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof StipulateEvents>(event: K, listener: (data: StipulateEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof StipulateEvents>(event: K, data: StipulateEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}

/** Process-wide bus the contract engine reports on. */
export const contractEvents = new EventBus();
