/**
 * Turns `scutil --proxy` output into the proxy variables curl and git honour.
 *
 * ```
 * <dictionary> {
 *   ExceptionsList : <array> {
 *     0 : *.local
 *   }
 *   HTTPEnable : 1
 *   HTTPPort : 8080
 *   HTTPProxy : proxy.example.test
 * }
 * ```
 */
export function parseScutilProxy(output: string): Record<string, string> {
  const settings = parseSettings(output);
  const env: Record<string, string> = {};

  const http = proxyUrl(settings, "HTTP", "http");
  if (http) {
    env.HTTP_PROXY = http;
    env.http_proxy = http;
  }

  const https = proxyUrl(settings, "HTTPS", "http");
  if (https) {
    env.HTTPS_PROXY = https;
    env.https_proxy = https;
  }

  const socks = proxyUrl(settings, "SOCKS", "socks5");
  if (socks) {
    env.ALL_PROXY = socks;
    env.all_proxy = socks;
  }

  const exceptions = parseExceptions(output);
  if (exceptions.length > 0) {
    const noProxy = exceptions.join(",");
    env.NO_PROXY = noProxy;
    env.no_proxy = noProxy;
  }

  return env;
}

function proxyUrl(settings: Map<string, string>, prefix: string, scheme: string): string | undefined {
  const host = settings.get(`${prefix}Proxy`);
  const port = settings.get(`${prefix}Port`);
  if (settings.get(`${prefix}Enable`) !== "1" || !host || !port) {
    return undefined;
  }
  return `${scheme}://${host}:${port}`;
}

function parseSettings(output: string): Map<string, string> {
  const settings = new Map<string, string>();
  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    const separator = trimmed.indexOf(" : ");
    if (separator < 0) {
      continue;
    }
    settings.set(trimmed.slice(0, separator), trimmed.slice(separator + 3));
  }
  return settings;
}

function parseExceptions(output: string): string[] {
  const exceptions: string[] = [];
  let inList = false;

  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.includes("ExceptionsList")) {
      inList = true;
      continue;
    }
    if (!inList) {
      continue;
    }
    if (trimmed === "}") {
      break;
    }
    const separator = trimmed.indexOf(" : ");
    if (separator >= 0) {
      exceptions.push(trimmed.slice(separator + 3));
    }
  }

  return exceptions;
}
