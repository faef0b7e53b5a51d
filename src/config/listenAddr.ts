export type ListenAddress = {
  host: string | undefined;
  port: number;
};

/**
 * Parses `host:port`, `:port` or `[ipv6]:port`. An empty host means every
 * interface. Returns null for anything else.
 */
export function parseListenAddr(value: string): ListenAddress | null {
  const trimmed = value.trim();
  const sep = trimmed.lastIndexOf(":");
  if (sep === -1) return null;
  let host = trimmed.slice(0, sep);
  const portRaw = trimmed.slice(sep + 1);
  if (!/^\d+$/.test(portRaw)) return null;
  const port = Number(portRaw);
  if (port > 65535) return null;
  if (host.startsWith("[") && host.endsWith("]")) {
    host = host.slice(1, -1);
  }
  return { host: host || undefined, port };
}

export function formatListenAddr(host: string | undefined, port: number): string {
  if (!host) return `:${port}`;
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}
