export const FALLBACK_SOURCE = "global";

export type SourceDefinition = {
  name: string;
  hosts: string[];
};

export type SourceRegistry = SourceDefinition[];

export const defaultSourceRegistry: SourceRegistry = [{ name: "mangapill", hosts: ["mangapill.com"] }];

const SOURCE_TAG = /^[A-Za-z0-9_-]+$/;

const parseHttpUrl = (value: string): URL | undefined => {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:" ? url : undefined;
  } catch {
    return undefined;
  }
};

const hostMatches = (hostname: string, host: string): boolean =>
  hostname === host || hostname.endsWith(`.${host}`);

/**
 * Maps a job origin (a page URL or a bare source tag) onto the source bucket
 * admission control is keyed by.
 */
export const resolveSource = (originOrTag: string | null | undefined, registry: SourceRegistry = defaultSourceRegistry): string => {
  const value = originOrTag?.trim();
  if (!value) return FALLBACK_SOURCE;

  const url = parseHttpUrl(value);
  if (url) {
    const hostname = url.hostname.toLowerCase();
    const match = registry.find((source) => source.hosts.some((host) => hostMatches(hostname, host)));
    return match?.name ?? FALLBACK_SOURCE;
  }

  return SOURCE_TAG.test(value) ? value.toLowerCase() : FALLBACK_SOURCE;
};

export const isHttpUrl = (value: string | null | undefined): value is string =>
  typeof value === "string" && parseHttpUrl(value.trim()) != null;

/**
 * Parses `name=host,host;name2=host` into a registry. Names become lowercase
 * source tags; malformed entries fail fast.
 */
export const parseSourceRegistry = (raw: string): SourceRegistry =>
  raw
    .split(";")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "")
    .map((entry) => {
      const [name = "", hostList = ""] = entry.split("=", 2);
      const tag = name.trim();
      const hosts = hostList
        .split(",")
        .map((host) => host.trim().toLowerCase())
        .filter((host) => host !== "");
      if (!SOURCE_TAG.test(tag) || hosts.length === 0) {
        throw new Error(`Invalid source registry entry: ${entry}`);
      }
      return { name: tag.toLowerCase(), hosts };
    });
