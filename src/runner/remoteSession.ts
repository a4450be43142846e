import type { Point } from '../types/scan.js';
import type { RemoteTarget } from '../types/runner.js';
import type { ResultCapture, ResultFrame } from './ResultCapture.js';

/**
 * What the remote side of a chunked scan can ask of the coordinator. `requestChunk`
 * and `checkPause` are round trips; `pointCompleted` is a one-way message.
 */
export interface CoordinatorPort {
  requestChunk(): Promise<readonly Point[]>;
  pointCompleted(frame: ResultFrame): void;
  checkPause(): Promise<boolean>;
}

export interface RemoteSessionOptions {
  pauseCheckIntervalSeconds: number;
}

/**
 * The loop that runs next to the remote target: fetch a chunk, run its points in
 * order, acknowledge each one, and ask about pausing when enough device time has
 * passed and at every chunk boundary. Returns when a pause is requested; exhaustion
 * and interruption arrive as errors from the port.
 */
export async function runRemoteSession(
  target: RemoteTarget,
  port: CoordinatorPort,
  capture: ResultCapture,
  options: RemoteSessionOptions
): Promise<void> {
  let lastPauseCheck = target.now();
  while (true) {
    const chunk = await port.requestChunk();
    let checkedAfterLastPoint = false;
    for (const values of chunk) {
      capture.open();
      try {
        await target.runPoint(values);
      } catch (err) {
        capture.discard();
        throw err;
      }
      port.pointCompleted(capture.close());

      checkedAfterLastPoint = false;
      const now = target.now();
      if (now - lastPauseCheck > options.pauseCheckIntervalSeconds) {
        if (await port.checkPause()) return;
        lastPauseCheck = now;
        checkedAfterLastPoint = true;
      }
    }
    if (!checkedAfterLastPoint) {
      if (await port.checkPause()) return;
      lastPauseCheck = target.now();
    }
  }
}
