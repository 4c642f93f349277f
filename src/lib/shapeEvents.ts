import type { ShapeEvent } from '../types';

export type ShapeEventListener = (event: ShapeEvent) => void;

/**
 * Synchronous callback list for shape lifecycle notifications. Listeners run
 * in registration order on the caller's turn.
 */
export class ShapeEventBus {
  private listeners = new Set<ShapeEventListener>();

  subscribe(listener: ShapeEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: ShapeEvent): void {
    for (const listener of Array.from(this.listeners)) {
      listener(event);
    }
  }

  clear(): void {
    this.listeners.clear();
  }
}

/** Notifications from the markup canvas and the category ledger */
export const shapeEvents = new ShapeEventBus();
