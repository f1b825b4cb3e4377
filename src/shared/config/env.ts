export type Env = {
  REDIS_URL: string;
  MONGO_URI: string;
  DOWNLOAD_DIR: string;
};

const validateUrlScheme = (name: string, value: string, schemes: string[]): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute ${schemes.join("/")} URL. Received: ${value}`);
  }

  if (!schemes.some((scheme) => parsed.protocol === `${scheme}:`)) {
    throw new Error(`${name} must use ${schemes.join(" or ")} scheme. Received: ${value}`);
  }

  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const REDIS_URL = validateUrlScheme("REDIS_URL", env.REDIS_URL ?? "redis://localhost:6379/0", ["redis", "rediss"]);
  const MONGO_URI = validateUrlScheme("MONGO_URI", env.MONGO_URI ?? "mongodb://localhost:27017/chapter_downloader", [
    "mongodb",
    "mongodb+srv"
  ]);
  const DOWNLOAD_DIR = env.DOWNLOAD_DIR?.trim() ? env.DOWNLOAD_DIR.trim() : "./downloads";

  return { REDIS_URL, MONGO_URI, DOWNLOAD_DIR };
};
