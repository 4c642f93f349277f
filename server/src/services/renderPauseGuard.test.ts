import { describe, it, expect, vi } from 'vitest';
import type { PausableRenderer } from './pagePreviewRenderer';
import { withRenderingPaused } from './renderPauseGuard';

class RecordingRenderer implements PausableRenderer {
  readonly events: string[] = [];
  private running = true;

  start(): void {
    this.running = true;
    this.events.push('start');
  }

  async stop(): Promise<void> {
    this.events.push('stop requested');
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.running = false;
    this.events.push('stopped');
  }

  isRendering(): boolean {
    return this.running;
  }
}

describe('withRenderingPaused', () => {
  it('runs the task only after rendering has stopped, then restarts it', async () => {
    const renderer = new RecordingRenderer();

    const result = await withRenderingPaused(renderer, async () => {
      renderer.events.push(renderer.isRendering() ? 'task while rendering' : 'task');
      return 'saved';
    });

    expect(result).toBe('saved');
    expect(renderer.events).toEqual(['stop requested', 'stopped', 'task', 'start']);
  });

  it('restarts rendering when the task fails', async () => {
    const renderer = new RecordingRenderer();

    await expect(
      withRenderingPaused(renderer, async () => {
        throw new Error('worker exited with code 1');
      })
    ).rejects.toThrow('worker exited with code 1');

    expect(renderer.events).toEqual(['stop requested', 'stopped', 'start']);
    expect(renderer.isRendering()).toBe(true);
  });

  it('keeps rendering stopped until the last overlapping task finishes', async () => {
    const renderer = new RecordingRenderer();
    let finishFirst = () => {};
    let finishSecond = () => {};
    const firstDone = new Promise<void>((resolve) => {
      finishFirst = resolve;
    });
    const secondDone = new Promise<void>((resolve) => {
      finishSecond = resolve;
    });

    const first = withRenderingPaused(renderer, async () => {
      renderer.events.push('first task');
      await firstDone;
    });
    const second = withRenderingPaused(renderer, async () => {
      renderer.events.push('second task');
      await secondDone;
      renderer.events.push(renderer.isRendering() ? 'second ends while rendering' : 'second ends');
    });

    await vi.waitFor(() => {
      expect(renderer.events).toContain('second task');
    });
    finishFirst();
    await first;
    finishSecond();
    await second;

    expect(renderer.events).toEqual(['stop requested', 'stopped', 'first task', 'second task', 'second ends', 'start']);
    expect(renderer.isRendering()).toBe(true);
  });

  it('starts a fresh pause once the previous one has ended', async () => {
    const renderer = new RecordingRenderer();

    await withRenderingPaused(renderer, async () => 'first');
    await withRenderingPaused(renderer, async () => 'second');

    expect(renderer.events).toEqual(['stop requested', 'stopped', 'start', 'stop requested', 'stopped', 'start']);
  });

  it('just runs the task without a renderer', async () => {
    await expect(withRenderingPaused(undefined, async () => 42)).resolves.toBe(42);
  });
});
