import path from "path";

export const DEFAULT_ASSET_EXTENSION = ".jpg";
export const ASSET_INDEX_WIDTH = 3;

const EXTENSION = /^\.[a-z0-9]{1,5}$/;

const urlPathname = (url: string): string => {
  try {
    return new URL(url).pathname;
  } catch {
    return url.split(/[?#]/, 1)[0] ?? "";
  }
};

export const assetExtension = (url: string): string => {
  const ext = path.posix.extname(urlPathname(url)).toLowerCase();
  return EXTENSION.test(ext) ? ext : DEFAULT_ASSET_EXTENSION;
};

// 1-based index: 1 -> "001.jpg"
export const assetFileName = (index: number, url: string): string =>
  `${String(index).padStart(ASSET_INDEX_WIDTH, "0")}${assetExtension(url)}`;
