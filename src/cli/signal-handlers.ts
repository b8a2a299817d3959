export type SyncAbortHandler = {
  signal: AbortSignal;
  dispose: () => void;
};

const STOP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

// The first SIGINT/SIGTERM aborts the run; the engine rolls back at its next step boundary.
// Listeners stay installed until dispose() so a repeated signal cannot kill the rollback.
export function createSyncAbortHandler(
  opts: {
    onAbort?: (signal: NodeJS.Signals) => void;
    onRepeat?: (signal: NodeJS.Signals) => void;
  } = {},
): SyncAbortHandler {
  const controller = new AbortController();
  let disposed = false;

  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      opts.onRepeat?.(signal);
      return;
    }

    try {
      opts.onAbort?.(signal);
    } finally {
      controller.abort(signal);
    }
  };

  for (const name of STOP_SIGNALS) {
    process.on(name, onSignal);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      if (disposed) return;
      disposed = true;
      for (const name of STOP_SIGNALS) {
        process.off(name, onSignal);
      }
    },
  };
}
