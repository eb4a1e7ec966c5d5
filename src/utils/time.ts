/**
 * Simple execution timer.
 */
export function createTimer() {
  const start = performance.now();

  return {
    /** Elapsed time in milliseconds */
    elapsed(): number {
      return Math.round(performance.now() - start);
    },

    /** Elapsed time as a human-readable string */
    display(): string {
      const ms = this.elapsed();
      if (ms < 1000) return `${ms}ms`;
      return `${(ms / 1000).toFixed(1)}s`;
    },
  };
}

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * Format a date in local time as `YYYY-MM-DD HH:mm:ss`, the format records
 * and reports are stamped with.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

/** English name of the date's calendar month (local time) */
export function monthName(date: Date): string {
  return MONTHS[date.getMonth()];
}
