import { connect } from 'net';
import { AbortedError } from './timeout';

/**
 * Resolve once a TCP handshake with host:port completes; the socket is closed
 * straight away. Rejects on connection error, timeout or abort.
 */
export function tcpReachable(host: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const socket = connect({ host, port });
    let settled = false;

    const finish = (err?: Error) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      socket.destroy();
      if (err) reject(err);
      else resolve();
    };
    const onAbort = () => finish(new AbortedError());

    socket.setTimeout(timeoutMs, () => finish(new Error(`connect timeout after ${timeoutMs}ms`)));
    socket.once('connect', () => finish());
    socket.once('error', (err) => finish(err));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
