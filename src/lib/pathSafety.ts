import * as fs from "fs";
import * as path from "path";

/**
 * Return a path that does not overwrite an existing file.
 *
 * If `candidate` does not exist it is returned unchanged. Otherwise the
 * trailing digits of its stem are stripped and incremented (or "2" is
 * appended) until a free `stem{k}.{ext}` is found. `ext` replaces the
 * candidate's extension on the numbered variants.
 */
export function safeOutputPath(candidate: string, ext?: string): string {
  if (!fs.existsSync(candidate)) {
    return candidate;
  }

  const parsed = path.parse(candidate);
  const extension = ext ?? parsed.ext.slice(1);
  const suffix = extension.length > 0 ? `.${extension}` : "";

  const stem = parsed.name.replace(/\d+$/, "");
  const digits = parsed.name.slice(stem.length);
  let k = digits.length > 0 ? Number(digits) + 1 : 2;

  while (fs.existsSync(path.join(parsed.dir, `${stem}${k}${suffix}`))) {
    k++;
  }

  return path.join(parsed.dir, `${stem}${k}${suffix}`);
}

/**
 * Verify that a resolved absolute path is contained within the anchor
 * directory. Both paths must already be resolved/absolute.
 *
 * Throws if the resolved path escapes the anchor.
 */
export function assertResolvedContainedIn(
  resolvedPath: string,
  anchor: string,
  label: string
): void {
  const resolvedAnchor = path.resolve(anchor);
  const normalizedPath = path.resolve(resolvedPath);
  const anchorPrefix = resolvedAnchor + path.sep;

  if (
    normalizedPath !== resolvedAnchor &&
    !normalizedPath.startsWith(anchorPrefix)
  ) {
    throw new PathEscapeError(
      `${label} resolves outside its allowed directory. ` +
        `Resolved: ${normalizedPath}, Anchor: ${resolvedAnchor}`
    );
  }
}

export class PathEscapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathEscapeError";
  }
}
