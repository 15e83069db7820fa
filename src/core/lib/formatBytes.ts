export type ByteUnit = "B" | "KB" | "MB" | "GB" | "TB" | "PB"

const UNITS: ReadonlyArray<ByteUnit> = ["B", "KB", "MB", "GB", "TB", "PB"]

const multiplier = (unit: ByteUnit): number => 1024 ** UNITS.indexOf(unit)

/**
 * Human-readable byte magnitude. `unit` is the unit `value` is expressed in.
 *
 * @example
 * formatBytes(1023)     // "1023 B"
 * formatBytes(1024)     // "1.0 KB"
 * formatBytes(1.5, "GB") // "1.50 GB"
 */
export const formatBytes = (value: number, unit: ByteUnit = "B"): string => {
  if (!Number.isFinite(value)) return "0 B"

  const bytes = value * multiplier(unit)
  const absBytes = Math.abs(bytes)
  const sign = bytes < 0 ? "-" : ""

  if (Math.round(absBytes) < 1024) return `${sign}${Math.round(absBytes)} B`

  let index = 0
  let scaled = absBytes
  while (Math.round(scaled) >= 1024 && index < UNITS.length - 1) {
    scaled /= 1024
    index++
  }

  const digits = index <= 2 ? 1 : 2
  return `${sign}${scaled.toFixed(digits)} ${UNITS[index]}`
}
