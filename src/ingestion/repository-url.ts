/**
 * Trim, drop trailing slashes and a `.git` suffix. Keeps the original case so
 * the result can still be used to build browsable links.
 */
export function stripRepositoryUrl(url: string): string {
  let stripped = url.trim().replace(/\/+$/, '');
  if (stripped.toLowerCase().endsWith('.git')) {
    stripped = stripped.slice(0, -'.git'.length);
  }
  return stripped.replace(/\/+$/, '');
}

/** Form under which repository mappings are stored and looked up. */
export function normalizeRepositoryUrl(url: string): string {
  return stripRepositoryUrl(url).toLowerCase();
}
