/**
 * Lines retrieved most-recent-first, put back in chronological order
 */
export function reverseLogLines(log: string): string {
  return log.split('\n').reverse().join('\n');
}

/** Lines fetched per container */
export const LOG_TAIL_LINES = 500;
