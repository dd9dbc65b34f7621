const DAY_NAMES = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

/**
 * Channel name for a clock reading, in UTC, e.g. `(Now: Mon 3:07pm UTC)`.
 */
export function formatClockName(date: Date): string {
  const day = DAY_NAMES[date.getUTCDay()];
  const hours = date.getUTCHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const minutes = String(date.getUTCMinutes()).padStart(2, "0");
  const suffix = hours < 12 ? "am" : "pm";
  return `(Now: ${day} ${hour12}:${minutes}${suffix} UTC)`;
}
