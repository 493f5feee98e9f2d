export const constants = {
  CONFIG_FILE: 'queue-listener.config.json',
  DEFAULT_CONNECTION: 'default',
  DEFAULT_QUEUE: 'default',
  DEFAULT_SUBCOMMAND: 'queue:work',
  /** Seconds between the kill signal and SIGKILL when a run times out. */
  KILL_GRACE_SECONDS: 10,
  /** Exit status used when the memory ceiling stops the listener. */
  MEMORY_EXIT_CODE: 0
} as const
