/**
 * Convert a host directory path into the form the warehouse's COPY-based
 * loaders expect: forward slashes and a trailing separator.
 *
 * "C:\\data\\source_crm" → "C:/data/source_crm/"
 */
export function toWarehousePath(dir: string): string {
  const normalized = dir.replace(/\\/g, "/");
  return normalized.endsWith("/") ? normalized : `${normalized}/`;
}
