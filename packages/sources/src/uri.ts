import { extname } from "node:path";
import { SUPPORTED_EXTENSIONS } from "@ingestkit/types";

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;

/** Lower-cased URI scheme; a bare path counts as `file`. */
export function schemeOf(uri: string): string {
  const match = SCHEME_PATTERN.exec(uri.trim());
  return match?.[1] ? match[1].toLowerCase() : "file";
}

/** Everything after `scheme://`, or the input when there is no scheme. */
export function stripScheme(uri: string): string {
  return uri.trim().replace(SCHEME_PATTERN, "");
}

export function extensionOf(path: string): string {
  return extname(path).toLowerCase();
}

export function isSupportedFile(path: string): boolean {
  const extension = extensionOf(path);
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}
