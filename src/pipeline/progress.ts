/**
 * Unit-count progress capability used by every engine.
 * Hosts plug in a terminal bar, a UI control or a recorder.
 */
export interface ProgressSink {
  start(total: number, label: string): void;
  advance(n: number): void;
  close(): void;
}

export const silentProgress: ProgressSink = {
  start: () => undefined,
  advance: () => undefined,
  close: () => undefined,
};
