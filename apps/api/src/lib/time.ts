function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYYMMDD_HHMMSS` in UTC. Used for pipeline ids and backup file names. */
export function compactTimestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}`;
}
