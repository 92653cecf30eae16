function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYYMMDD_HHMMSS`, matching `date +%Y%m%d_%H%M%S`. */
export function formatRunTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}
