/** The caller's computation for one item. Should stop early once `signal` aborts. */
export type ItemProcessor<TItem, TResult> = (item: TItem, signal: AbortSignal) => Promise<TResult>;

/** Per-run options for `BatchRunner.run()`. */
export interface RunOptions<TItem> {
  /**
   * Checkpoint identifier of an item. Must be stable across runs.
   * Default: the item itself, which then has to be a string.
   */
  readonly identify?: (item: TItem) => string;
  /** Reference written to the error log instead of the identifier, e.g. a full path. */
  readonly payloadRef?: (item: TItem) => string;
  /**
   * Number of items used for progress and ETA. Default: the array length, or
   * for other iterables the number of items seen once iteration ends.
   */
  readonly total?: number;
  /** Overrides the runner's `forceRerun` for this run. */
  readonly forceRerun?: boolean;
}
