export interface Rect {
  readonly x: number
  readonly y: number
  readonly width: number
  readonly height: number
}

export type Direction = "horizontal" | "vertical"

export type Constraint =
  | { readonly _tag: "Percentage"; readonly value: number }
  | { readonly _tag: "Length"; readonly value: number }
  | { readonly _tag: "Min"; readonly value: number }

export const Percentage = (value: number): Constraint => ({ _tag: "Percentage", value })
export const Length = (value: number): Constraint => ({ _tag: "Length", value })
export const Min = (value: number): Constraint => ({ _tag: "Min", value })

export interface SplitOptions {
  readonly direction: Direction
  readonly constraints: ReadonlyArray<Constraint>
  readonly margin?: number
}

export const rect = (x: number, y: number, width: number, height: number): Rect => ({
  x,
  y,
  width: Math.max(0, width),
  height: Math.max(0, height),
})

export const inner = (area: Rect, margin: number): Rect =>
  rect(area.x + margin, area.y + margin, area.width - margin * 2, area.height - margin * 2)

/**
 * Partitions `area` along one axis. Percentages round down, and whatever the
 * fixed segments leave over goes to a `Min` segment if there is one, otherwise
 * to the last segment, so the parts always tile the area exactly.
 */
export const split = (area: Rect, options: SplitOptions): Rect[] => {
  const bounds = inner(area, options.margin ?? 0)
  const total = options.direction === "horizontal" ? bounds.width : bounds.height
  const { constraints } = options
  if (constraints.length === 0) return []

  let remaining = total
  const sizes = constraints.map((constraint) => {
    const wanted =
      constraint._tag === "Percentage"
        ? Math.floor((total * constraint.value) / 100)
        : constraint.value
    const size = Math.max(0, Math.min(wanted, remaining))
    remaining -= size
    return size
  })

  const growIndex = constraints.findIndex((c) => c._tag === "Min")
  const target = growIndex === -1 ? sizes.length - 1 : growIndex
  sizes[target] = (sizes[target] ?? 0) + remaining

  let cursor = 0
  return sizes.map((size) => {
    const offset = cursor
    cursor += size
    return options.direction === "horizontal"
      ? rect(bounds.x + offset, bounds.y, size, bounds.height)
      : rect(bounds.x, bounds.y + offset, bounds.width, size)
  })
}
