import pino, { type Logger } from "pino";
import type { ChangeListener, ChangeReason, FileWatcher, WatchHandle } from "../../src/watch";

export class FakeWatcher implements FileWatcher {
  closed = false;
  private nextId = 0;
  private readonly listeners = new Map<number, { path: string; listener: ChangeListener }>();

  watch(path: string, onChange: ChangeListener): WatchHandle {
    const handle = { id: ++this.nextId, path };
    this.listeners.set(handle.id, { path, listener: onChange });
    return handle;
  }

  unwatch(handle: WatchHandle): void {
    this.listeners.delete(handle.id);
  }

  close(): void {
    this.closed = true;
    this.listeners.clear();
  }

  trigger(path: string, reason: ChangeReason = "modified"): void {
    for (const watched of Array.from(this.listeners.values())) {
      if (watched.path === path) {
        watched.listener(path, reason);
      }
    }
  }

  get activeWatches(): number {
    return this.listeners.size;
  }
}

export const silentLogger = (): Logger => pino({ level: "silent" });

export function recordingLogger(level: pino.LevelWithSilent = "info"): { logger: Logger; lines: () => Array<Record<string, unknown>> } {
  const written: string[] = [];
  const logger = pino(
    { level },
    {
      write(message: string) {
        written.push(message);
      }
    }
  );
  return {
    logger,
    lines: () => written.map((line) => JSON.parse(line) as Record<string, unknown>)
  };
}
