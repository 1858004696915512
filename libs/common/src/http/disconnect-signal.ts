import type { Response } from 'express';

/**
 * Aborts when the client goes away before the response has been written.
 */
export function disconnectSignal(response: Response): AbortSignal {
  const controller = new AbortController();
  response.on('close', () => {
    if (!response.writableFinished) {
      controller.abort(new Error('Client disconnected'));
    }
  });
  return controller.signal;
}
