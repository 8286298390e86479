function zonedParts(d: Date, timeZone: string): Record<string, string> {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
    timeZoneName: "longOffset"
  });
  const parts: Record<string, string> = {};
  for (const { type, value } of formatter.formatToParts(d)) {
    parts[type] = value;
  }
  return parts;
}

/** "GMT+08:00" → "+08:00"; bare "GMT" (UTC) → "+00:00" */
function offsetFromZoneName(name: string | undefined): string {
  const m = (name ?? "").match(/([+-]\d{2}):?(\d{2})/);
  return m ? `${m[1]}:${m[2]}` : "+00:00";
}

/**
 * Re-express an instant as wall-clock time in `timeZone`, keeping the offset:
 * `toTimezoneTime("2024-01-01T20:00:00Z", "Asia/Shanghai")` →
 * `"2024-01-02T04:00:00+08:00"`.
 */
export function toTimezoneTime(instant: string | Date, timeZone: string): string {
  const d = typeof instant === "string" ? new Date(instant) : instant;
  if (Number.isNaN(d.getTime())) {
    throw new RangeError(`Invalid timestamp: ${String(instant)}`);
  }
  const p = zonedParts(d, timeZone);
  return `${p.year}-${p.month}-${p.day}T${p.hour}:${p.minute}:${p.second}${offsetFromZoneName(p.timeZoneName)}`;
}

/** YYYY-MM-DD of `d` in `timeZone`. */
export function getISODate(d: Date, timeZone: string): string {
  const p = zonedParts(d, timeZone);
  return `${p.year}-${p.month}-${p.day}`;
}
