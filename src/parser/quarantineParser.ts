/** Seconds between the Unix epoch and 2001-01-01T00:00:00Z. */
export const REFERENCE_EPOCH_OFFSET_SECONDS = 978_307_200;

const HEX_RE = /^[0-9a-f]+$/i;

/**
 * Decodes the `com.apple.quarantine` attribute, `flags;timestamp;agent;uuid`,
 * where the timestamp is hex seconds since 2001-01-01.
 */
export function decodeQuarantineDate(attribute: string): Date | undefined {
  const fields = attribute.split(";");
  if (fields.length < 2) {
    return undefined;
  }

  const hex = fields[1].trim();
  if (!HEX_RE.test(hex)) {
    return undefined;
  }

  const seconds = Number.parseInt(hex, 16);
  return new Date((REFERENCE_EPOCH_OFFSET_SECONDS + seconds) * 1000);
}

/**
 * Finds the app bundle in `brew info --cask` text: the line after
 * `==> Artifacts`, e.g. `Firefox.app (App)`.
 */
export function parseCaskAppArtifact(output: string): string | undefined {
  const lines = output.split(/\r?\n/);
  for (let i = 0; i < lines.length - 1; i += 1) {
    if (!lines[i].includes("==> Artifacts")) {
      continue;
    }

    const next = lines[i + 1];
    const appIndex = next.indexOf(".app");
    if (appIndex < 0) {
      continue;
    }

    const appName = next.slice(0, appIndex + ".app".length).trim();
    if (appName) {
      return appName;
    }
  }

  return undefined;
}
