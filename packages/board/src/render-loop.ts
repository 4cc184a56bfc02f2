/**
 * Render consumer loop
 * The single downstream sink: wakes on the update signal (or after the
 * idle bound), snapshots the store and hands the snapshot to the renderer.
 */

import {
  RenderError,
  errorMessage,
  type SharedStateStore,
  type Snapshot,
  type SourceValues,
  type UpdateSignal,
} from "@departure-board/core";

export type RenderFn = (snapshot: Snapshot<SourceValues>) => Promise<void>;

export interface RenderLoopOptions {
  store: SharedStateStore<SourceValues>;
  updates: UpdateSignal;
  render: RenderFn;
  /** Longest time between two renders, so the clock never freezes */
  waitTimeoutMs: number;
  signal?: AbortSignal;
}

/**
 * One wake-snapshot-render pass.
 *
 * The signal is drained before the snapshot is taken: an update raised
 * while rendering stays pending for the next pass instead of being lost.
 * Resolves undefined, without rendering, if shutdown aborts the wait.
 */
export async function renderOnce(
  options: RenderLoopOptions
): Promise<Snapshot<SourceValues> | undefined> {
  await options.updates.wait(options.waitTimeoutMs, options.signal);
  // Nothing may be drawn after shutdown or a fatal error
  if (options.signal?.aborted) return undefined;
  options.updates.drain();

  const snapshot = options.store.snapshot();
  try {
    await options.render(snapshot);
  } catch (error) {
    if (error instanceof RenderError) throw error;
    throw new RenderError(`Render failed: ${errorMessage(error)}`, { cause: error });
  }
  return snapshot;
}

/**
 * Render until the shutdown signal aborts. Rejects with a RenderError if
 * rendering fails; failures are not retried.
 */
export async function runRenderLoop(options: RenderLoopOptions): Promise<void> {
  while (!options.signal?.aborted) {
    await renderOnce(options);
  }
}
