const FALLBACK_NAME = "discord_channel";

/**
 * Sanitize a channel label for use as a directory and file name.
 *
 * Anything other than letters, digits, `_`, `-` and `.` becomes `_`, runs
 * of `_` collapse, and leading/trailing `_` or `.` are trimmed. Applying
 * it twice gives the same result as applying it once.
 */
export function sanitizeFilename(name: string, maxLength = 100): string {
  const cleaned = name
    .normalize("NFC")
    .replace(/[^\p{L}\p{N}_.-]/gu, "_")
    .replace(/_{2,}/g, "_")
    .slice(0, maxLength)
    .replace(/^[_.]+|[_.]+$/g, "");
  return cleaned || FALLBACK_NAME;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Local-time stamp like `20240115_090503` for export file names.
 */
export function fileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}
