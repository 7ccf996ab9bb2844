function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD_HH-MM-SS`
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

export function formatElapsedSeconds(startMs: number, endMs: number): string {
  return ((endMs - startMs) / 1000).toFixed(2);
}
