export type HistoryOutcome = "ok" | "failed" | "timeout" | "spawn_failure";

export interface HistoryEntry {
  readonly command: string;
  readonly timestamp: string;
  readonly cwd: string;
  readonly exitCode: number | null;
  readonly outcome: HistoryOutcome;
  readonly output: string;
}

export interface SessionOptions {
  initialDirectory: string;
  historyLimit: number;
}

/**
 * Mutable state shared by every executor operation: the working directory
 * and a FIFO-bounded history log. Callers hold the session lock while
 * mutating.
 */
export class SessionState {
  private cwd: string;
  private readonly entries: HistoryEntry[] = [];
  readonly historyLimit: number;

  constructor(options: SessionOptions) {
    this.cwd = options.initialDirectory;
    this.historyLimit = Math.max(1, Math.floor(options.historyLimit));
  }

  get currentDirectory(): string {
    return this.cwd;
  }

  setCurrentDirectory(absolutePath: string): void {
    this.cwd = absolutePath;
  }

  record(entry: HistoryEntry): HistoryEntry {
    const frozen = Object.freeze({ ...entry });
    this.entries.push(frozen);
    while (this.entries.length > this.historyLimit) this.entries.shift();
    return frozen;
  }

  /** Most recent first. */
  recent(count: number): HistoryEntry[] {
    if (!Number.isFinite(count) || count <= 0) return [];
    const n = Math.min(Math.floor(count), this.entries.length);
    return this.entries.slice(this.entries.length - n).reverse();
  }

  get historySize(): number {
    return this.entries.length;
  }
}

/** Serialises async sections on a promise chain. */
export class SessionLock {
  private chain: Promise<unknown> = Promise.resolve();

  run<T>(operation: () => Promise<T> | T): Promise<T> {
    const next = this.chain.then(operation);
    this.chain = next.then(() => undefined, () => undefined);
    return next;
  }
}
