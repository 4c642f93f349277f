import type { PausableRenderer } from './pagePreviewRenderer';

interface RenderPause {
  holders: number;
  stopped: Promise<void>;
}

// One pause per renderer, shared by every task that overlaps it
const activePauses = new WeakMap<PausableRenderer, RenderPause>();

/**
 * Run `task` with background rendering fully stopped. Overlapping calls on
 * the same renderer share one pause: the first stops rendering and the last
 * to finish starts it again, whatever the tasks' outcomes.
 */
export async function withRenderingPaused<T>(renderer: PausableRenderer | undefined, task: () => Promise<T>): Promise<T> {
  if (!renderer) {
    return task();
  }

  let pause = activePauses.get(renderer);
  if (!pause) {
    pause = { holders: 0, stopped: renderer.stop() };
    activePauses.set(renderer, pause);
  }
  pause.holders++;

  try {
    await pause.stopped;
    return await task();
  } finally {
    pause.holders--;
    if (pause.holders === 0) {
      activePauses.delete(renderer);
      renderer.start();
    }
  }
}
