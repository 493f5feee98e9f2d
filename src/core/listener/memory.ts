export interface MemoryProbe {
  /** Current usage in megabytes. */
  usageMb(): number
}

/** Resident set size of the supervising process itself, not of the worker. */
export const processMemoryProbe: MemoryProbe = {
  usageMb: (): number => process.memoryUsage.rss() / 1024 / 1024
}

