/**
 * Signal Forwarder
 *
 * Relays termination signals from the launcher to the wrapped binary and
 * mirrors the child's exit status once it is gone.
 */
import { ChildProcess } from 'child_process';
import { describeError } from '../errors';

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Forward SIGINT, SIGTERM, SIGHUP to a child process.
 * Returns a cleanup function to remove the handlers.
 */
export function forwardSignals(
  child: ChildProcess,
  signals: readonly NodeJS.Signals[] = FORWARDED_SIGNALS
): () => void {
  const handlers = signals.map((signal) => {
    const handler = () => {
      if (!child.killed) child.kill(signal);
    };
    process.on(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) {
      process.removeListener(signal, handler);
    }
  };
}

export type ChildProcessErrorHandler = (err: NodeJS.ErrnoException) => void | Promise<void>;
export type ChildProcessExitHandler = (code: number | null, signal: NodeJS.Signals | null) => void;

/** Exit the same way the child did: re-raise its signal, or pass its code through */
export function mirrorChildExit(code: number | null, signal: NodeJS.Signals | null): void {
  if (signal) process.kill(process.pid, signal);
  else process.exit(code ?? 1);
}

/**
 * Attach signal forwarding to a child process.
 * Listeners are removed on the first of exit/error; only that one handler runs.
 */
export function wireChildProcessSignals(
  child: ChildProcess,
  onError: ChildProcessErrorHandler,
  onExit: ChildProcessExitHandler = mirrorChildExit
): void {
  const cleanupSignalHandlers = forwardSignals(child);
  let settled = false;

  const settle = (): boolean => {
    if (settled) return false;
    settled = true;
    cleanupSignalHandlers();
    return true;
  };

  child.on('exit', (code, signal) => {
    if (!settle()) return;
    onExit(code, signal);
  });

  child.on('error', async (err: NodeJS.ErrnoException) => {
    if (!settle()) return;
    try {
      await onError(err);
    } catch (handlerErr) {
      const message = describeError(handlerErr);
      console.error(`[X] Failed to handle child process error: ${message}`);
      process.exit(1);
    }
  });
}
