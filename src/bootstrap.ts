import { loadSettings } from './services/documentActions';
import { connectCanvasToLedger } from './store';

export interface TakeoffSession {
  /** Resolves once persisted settings are in the stores */
  ready: Promise<void>;
  stop: () => void;
}

/**
 * Wire the canvas to the ledger and pull persisted settings. Called once
 * when the interface mounts; `stop` undoes the wiring.
 */
export function startTakeoffSession(): TakeoffSession {
  const disconnect = connectCanvasToLedger();
  console.log('🚀 APP: Takeoff session started');
  return { ready: loadSettings(), stop: disconnect };
}
