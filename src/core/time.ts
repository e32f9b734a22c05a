/** Parses `[[h:]m:]s` (or a plain number of seconds) into seconds. */
export function parseDuration(value: string | number): number {
  if (typeof value === "number") {
    if (!Number.isInteger(value) || value < 0) throw new Error(`invalid duration: ${value}`);
    return value;
  }

  const trimmed = value.trim();
  if (!/^[0-9]+(:[0-9]+(:[0-9]+)?)?$/.test(trimmed)) throw new Error(`invalid duration: ${value}`);

  const parts = trimmed.split(":").map((p) => Number.parseInt(p, 10));
  const seconds = parts[parts.length - 1] ?? 0;
  const minutes = parts.length > 1 ? (parts[parts.length - 2] ?? 0) : 0;
  const hours = parts.length > 2 ? (parts[0] ?? 0) : 0;
  return seconds + minutes * 60 + hours * 3600;
}

export function formatSlurmTimeLimit(seconds: number): string {
  if (!Number.isInteger(seconds) || seconds < 1) throw new Error(`invalid time limit: ${seconds}`);

  const days = Math.floor(seconds / 86400);
  const rem = seconds - days * 86400;
  const hours = Math.floor(rem / 3600);
  const rem2 = rem - hours * 3600;
  const minutes = Math.floor(rem2 / 60);
  const secs = rem2 - minutes * 60;

  const hh = String(hours).padStart(2, "0");
  const mm = String(minutes).padStart(2, "0");
  const ss = String(secs).padStart(2, "0");

  if (days > 0) return `${days}-${hh}:${mm}:${ss}`;
  return `${hh}:${mm}:${ss}`;
}
