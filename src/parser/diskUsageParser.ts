/** `du -sk <path>` prints `<kilobytes>\t<path>`; returns bytes, or 0 when unreadable. */
export function parseDuBytes(output: string): number {
  const first = output.trim().split(/\s+/)[0] ?? "";
  if (!/^\d+$/.test(first)) {
    return 0;
  }
  return Number(first) * 1024;
}

/** First line of `brew --version` without the `Homebrew ` prefix. */
export function parseBrewVersion(output: string): string | undefined {
  const firstLine = output.trim().split(/\r?\n/)[0]?.trim();
  if (!firstLine) {
    return undefined;
  }
  return firstLine.replace(/^Homebrew\s+/, "");
}

/** `brew analytics state`: "InfluxDB analytics are enabled." */
export function parseAnalyticsState(output: string): boolean {
  const text = output.trim().toLowerCase();
  if (text.includes("disabled")) {
    return false;
  }
  return text.includes("enabled") || /\bon\b/.test(text);
}
