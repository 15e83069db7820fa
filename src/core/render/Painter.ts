import { inner, type Rect } from "./Layout"
import { plain, sameStyle, type Color, type Style } from "./Style"
import { Widget, type BlockSpec, type Line } from "./Widget"

// =============================================================================
// Canvas
// =============================================================================

export interface Cell {
  symbol: string
  style: Style
}

export interface Canvas {
  readonly width: number
  readonly height: number
  readonly cells: Cell[]
}

export const makeCanvas = (width: number, height: number): Canvas => ({
  width,
  height,
  cells: Array.from({ length: Math.max(0, width * height) }, () => ({ symbol: " ", style: plain })),
})

const setCell = (canvas: Canvas, x: number, y: number, symbol: string, style: Style): void => {
  if (x < 0 || y < 0 || x >= canvas.width || y >= canvas.height) return
  canvas.cells[y * canvas.width + x] = { symbol, style }
}

/** Writes `text` starting at (x, y), clipped to `maxWidth` columns. */
export const drawText = (
  canvas: Canvas,
  x: number,
  y: number,
  text: string,
  style: Style,
  maxWidth: number
): number => {
  let column = 0
  for (const ch of text) {
    if (column >= maxWidth) break
    setCell(canvas, x + column, y, ch, style)
    column++
  }
  return column
}

const drawLine = (canvas: Canvas, x: number, y: number, line: Line, maxWidth: number): void => {
  let column = 0
  for (const s of line) {
    column += drawText(canvas, x + column, y, s.text, s.style, maxWidth - column)
  }
}

// =============================================================================
// Widgets
// =============================================================================

const BORDER = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
} as const

const SPARKLINE_LEVELS = [" ", "▁", "▂", "▃", "▄", "▅", "▆", "▇", "█"] as const

/** Paints the block decoration and returns the area left for its content. */
const paintBlock = (canvas: Canvas, area: Rect, block: BlockSpec): Rect => {
  if (area.width === 0 || area.height === 0) return area

  if (!block.borders) {
    if (block.title === undefined) return area
    drawText(canvas, area.x, area.y, block.title.text, block.title.style, area.width)
    return { ...area, y: area.y + 1, height: Math.max(0, area.height - 1) }
  }

  const right = area.x + area.width - 1
  const bottom = area.y + area.height - 1
  const style = block.borderStyle
  for (let x = area.x + 1; x < right; x++) {
    setCell(canvas, x, area.y, BORDER.horizontal, style)
    setCell(canvas, x, bottom, BORDER.horizontal, style)
  }
  for (let y = area.y + 1; y < bottom; y++) {
    setCell(canvas, area.x, y, BORDER.vertical, style)
    setCell(canvas, right, y, BORDER.vertical, style)
  }
  setCell(canvas, area.x, area.y, BORDER.topLeft, style)
  setCell(canvas, right, area.y, BORDER.topRight, style)
  setCell(canvas, area.x, bottom, BORDER.bottomLeft, style)
  setCell(canvas, right, bottom, BORDER.bottomRight, style)

  if (block.title !== undefined) {
    drawText(canvas, area.x + 1, area.y, block.title.text, block.title.style, area.width - 2)
  }
  return inner(area, 1)
}

/**
 * Eighth-block bars, bottom up. Each column gets `value * height * 8 / max`
 * eighths; values above `max` fill the column.
 */
const paintSparkline = (
  canvas: Canvas,
  area: Rect,
  data: ReadonlyArray<number>,
  max: number,
  style: Style
): void => {
  const columns = Math.min(area.width, data.length)
  const eighths = data
    .slice(0, columns)
    .map((value) => (max > 0 ? Math.floor((value * area.height * 8) / max) : 0))

  for (let row = area.height - 1; row >= 0; row--) {
    eighths.forEach((remaining, i) => {
      const level = Math.max(0, Math.min(8, remaining))
      setCell(canvas, area.x + i, area.y + row, SPARKLINE_LEVELS[level] ?? " ", style)
      eighths[i] = Math.max(0, remaining - 8)
    })
  }
}

export const paint = (canvas: Canvas, widgets: ReadonlyArray<Widget>): Canvas => {
  for (const widget of widgets) {
    Widget.$match(widget, {
      Block: ({ rect, block }) => {
        paintBlock(canvas, rect, block)
      },
      List: ({ rect, block, items }) => {
        const content = paintBlock(canvas, rect, block)
        items.slice(0, content.height).forEach((item, row) => {
          drawText(canvas, content.x, content.y + row, item.text, item.style, content.width)
        })
      },
      Sparkline: ({ rect, block, data, max, style }) => {
        const content = paintBlock(canvas, rect, block)
        paintSparkline(canvas, content, data, max, style)
      },
      Paragraph: ({ rect, lines }) => {
        lines.slice(0, rect.height).forEach((line, row) => {
          drawLine(canvas, rect.x, rect.y + row, line, rect.width)
        })
      },
    })
  }
  return canvas
}

// =============================================================================
// Serialization
// =============================================================================

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
} as const

const COLOR_CODES: Record<Color, number> = {
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
  gray: 90,
  lightYellow: 93,
  lightMagenta: 95,
}

const openStyle = (style: Style): string =>
  `${style.bold ? ANSI.bold : ""}${style.fg ? `\x1b[${COLOR_CODES[style.fg]}m` : ""}`

export interface SerializeOptions {
  readonly color: boolean
}

/**
 * One string per canvas row. Plain rows drop trailing blanks; colored rows
 * emit an SGR sequence whenever the style changes and reset at the row end.
 */
export const toLines = (canvas: Canvas, options: SerializeOptions): string[] => {
  const lines: string[] = []
  for (let y = 0; y < canvas.height; y++) {
    const row = canvas.cells.slice(y * canvas.width, (y + 1) * canvas.width)
    if (!options.color) {
      lines.push(row.map((c) => c.symbol).join("").trimEnd())
      continue
    }
    let out = ""
    let current: Style = plain
    for (const cell of row) {
      if (!sameStyle(cell.style, current)) {
        out += ANSI.reset + openStyle(cell.style)
        current = cell.style
      }
      out += cell.symbol
    }
    lines.push(out + ANSI.reset)
  }
  return lines
}

export const renderToLines = (
  widgets: ReadonlyArray<Widget>,
  area: Rect,
  options: SerializeOptions
): string[] =>
  toLines(paint(makeCanvas(area.x + area.width, area.y + area.height), widgets), options)
