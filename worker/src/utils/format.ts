const UNITS = ["B", "KB", "MB", "GB", "TB"];

export function formatBytes(size: number): string {
  if (!Number.isFinite(size) || size < 0) return "unknown size";

  let value = size;
  for (const unit of UNITS) {
    if (value < 1024) {
      return `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}
