/**
 * packages/node/src/signalBus.ts — In-process signal bus on a Node EventEmitter.
 *
 * The bus is a coordinator dispatch target: `emit(type, signal)` fans out to
 * listeners of that exact type, then to catch-all listeners.
 */

import { EventEmitter } from "node:events";
import type { Signal } from "@unified-ui/core";

export type SignalListener = (signal: Signal) => void;

export type SignalBus = Readonly<{
  emit(eventName: string, ...args: unknown[]): boolean;
  /** Returns an unsubscribe function. */
  on(type: string, listener: SignalListener): () => void;
  onAny(listener: SignalListener): () => void;
  listenerCount(type?: string): number;
  clear(): void;
}>;

const ANY = Symbol("unified-ui.signal.any");

function isSignal(value: unknown): value is Signal {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    "id" in value &&
    typeof value.id === "string"
  );
}

export function createSignalBus(): SignalBus {
  const emitter = new EventEmitter();
  emitter.setMaxListeners(0);

  const subscribe = (key: string | symbol, listener: SignalListener): (() => void) => {
    emitter.on(key, listener);
    return () => {
      emitter.off(key, listener);
    };
  };

  return Object.freeze({
    emit(eventName: string, ...args: unknown[]): boolean {
      const [signal] = args;
      if (!isSignal(signal) || signal.type !== eventName) return false;
      const exact = emitter.emit(eventName, signal);
      const any = emitter.emit(ANY, signal);
      return exact || any;
    },
    on: (type: string, listener: SignalListener) => subscribe(type, listener),
    onAny: (listener: SignalListener) => subscribe(ANY, listener),
    listenerCount(type?: string): number {
      return type === undefined ? emitter.listenerCount(ANY) : emitter.listenerCount(type);
    },
    clear(): void {
      emitter.removeAllListeners();
    },
  });
}
