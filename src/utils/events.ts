import { EventEmitter } from "node:events";
import type { LedgerEventMap, LedgerEventName, LedgerLogger } from "./types";
import { logSoftError } from "./errors";

export type LedgerEventHandler<E extends LedgerEventName> = (payload: LedgerEventMap[E]) => void | Promise<void>;

/**
 * Typed notifications. A listener that throws or rejects is logged; the
 * operation that emitted the event has already been applied and stays so.
 */
export class LedgerEvents {
  private readonly emitter = new EventEmitter();

  constructor(private readonly logger: LedgerLogger) {}

  on<E extends LedgerEventName>(name: E, handler: LedgerEventHandler<E>): () => void {
    const listener = (payload: LedgerEventMap[E]) => {
      try {
        const result = handler(payload);
        if (result instanceof Promise) {
          result.catch((error: unknown) => logSoftError(`Listener for ${name} failed`, error, this.logger));
        }
      } catch (error: unknown) {
        logSoftError(`Listener for ${name} failed`, error, this.logger);
      }
    };
    this.emitter.on(name, listener);
    return () => {
      this.emitter.off(name, listener);
    };
  }

  emit<E extends LedgerEventName>(name: E, payload: LedgerEventMap[E]): void {
    this.emitter.emit(name, payload);
  }

  listenerCount(name: LedgerEventName): number {
    return this.emitter.listenerCount(name);
  }
}
