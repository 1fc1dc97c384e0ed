import type { Response } from 'express';

/**
 * Runs `work` with a signal that aborts if the client hangs up before the
 * response is written.
 */
export async function withClientAbort<T>(
  res: Response,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableEnded) controller.abort(new Error('Client disconnected'));
  };

  res.on('close', onClose);
  try {
    return await work(controller.signal);
  } finally {
    res.off('close', onClose);
  }
}
