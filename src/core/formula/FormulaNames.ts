/**
 * Formula naming helpers.
 *
 * @module
 */

const ARCHIVE_EXTENSIONS = [".tar.gz", ".tgz", ".tar.bz2", ".tar.xz", ".zip"];

/**
 * Derives a formula name from a source tarball URL.
 *
 * `https://example.com/dl/mytool-1.2.3.tar.gz?x=1` becomes `mytool`.
 *
 * @returns The name, or null when nothing usable remains
 */
export function deriveFormulaName(url: string): string | null {
  const withoutQuery = url.split("?")[0] ?? "";
  const withoutFragment = withoutQuery.split("#")[0] ?? "";
  let base = withoutFragment.split("/").pop() ?? "";

  const extension = ARCHIVE_EXTENSIONS.find((ext) => base.endsWith(ext));
  if (extension) {
    base = base.slice(0, -extension.length);
  }

  const dash = base.lastIndexOf("-");
  if (dash !== -1 && /^[0-9v]/.test(base.slice(dash + 1))) {
    base = base.slice(0, dash);
  }

  return base === "" ? null : base;
}

/**
 * Ruby class name for a formula: `my-cool_tool` becomes `MyCoolTool`.
 */
export function formulaClassName(name: string): string {
  return name
    .split(/[-_]/)
    .filter((part) => part !== "")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}
