// src/sockets/notifier.ts
import { RealtimeConnection } from '../types/realtime.types';
import { serverMessage } from './messages';

/**
 * Sends a periodic server notification until `signal` aborts. The task
 * never stops itself except when a write fails, which it reports through
 * `onFailure` so the owner can retire the connection.
 */
export const startNotifier = (
  connection: RealtimeConnection,
  identity: string,
  intervalMs: number,
  signal: AbortSignal,
  onFailure: (err: unknown) => void
): void => {
  if (signal.aborted) {
    return;
  }

  let sequence = 1;
  const timer = setInterval(() => {
    try {
      connection.send(
        serverMessage('notification', `Hello ${identity}, this is a sample notification no. ${sequence}`)
      );
      sequence++;
    } catch (err) {
      clearInterval(timer);
      onFailure(err);
    }
  }, intervalMs);

  signal.addEventListener(
    'abort',
    () => {
      clearInterval(timer);
      console.log(`[WS] Stopping notifications for ${identity}`);
    },
    { once: true }
  );
};
