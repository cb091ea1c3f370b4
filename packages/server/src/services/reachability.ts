import net from "node:net";

/** Checks that an accelerator host accepts connections. */
export interface ReachabilityProbe {
  check(host: string, port: number, timeoutMs: number): Promise<boolean>;
}

/** Opens and closes a TCP connection; any error or timeout reads as unreachable. */
export class TcpReachabilityProbe implements ReachabilityProbe {
  check(host: string, port: number, timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const socket = net.connect({ host, port });
      const done = (reachable: boolean) => {
        socket.destroy();
        resolve(reachable);
      };
      socket.setTimeout(timeoutMs, () => done(false));
      socket.once("connect", () => done(true));
      socket.once("error", () => done(false));
    });
  }
}

/**
 * Normalise an address or URL to the accelerator's base URL (no trailing
 * slash). Bare addresses are served over plain HTTP.
 */
export function formatUrl(address: string): string {
  const trimmed = address.trim().replace(/\/+$/, "");
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

export interface ProbeTarget {
  host: string;
  port: number;
}

/** TCP target of an address: the URL's own port, 443 for https, else `defaultPort`. */
export function probeTarget(address: string, defaultPort: number): ProbeTarget {
  const url = new URL(formatUrl(address));
  const host = url.hostname.replace(/^\[(.*)\]$/, "$1");
  const port = url.port
    ? Number(url.port)
    : url.protocol === "https:"
      ? 443
      : defaultPort;
  return { host, port };
}
