import { describe, expect, test } from "vitest"
import { rect } from "./Layout"
import { drawText, makeCanvas, renderToLines, toLines } from "./Painter"
import { bold, fg, plain } from "./Style"
import { Widget, bordered, span, titled } from "./Widget"

describe("Painter", () => {
  test("bordered block with title", () => {
    const lines = renderToLines(
      [Widget.Block({ rect: rect(0, 0, 6, 3), block: bordered("Ab", plain) })],
      rect(0, 0, 6, 3),
      { color: false }
    )
    expect(lines).toEqual(["┌Ab──┐", "│    │", "└────┘"])
  })

  test("sparkline fills eighths bottom up", () => {
    const lines = renderToLines(
      [
        Widget.Sparkline({
          rect: rect(0, 0, 4, 3),
          block: titled("T"),
          data: [0, 1, 2, 4],
          max: 4,
          style: plain,
        }),
      ],
      rect(0, 0, 4, 3),
      { color: false }
    )
    expect(lines).toEqual(["T", "   █", " ▄██"])
  })

  test("sparkline clips to its width and saturates above max", () => {
    const lines = renderToLines(
      [
        Widget.Sparkline({
          rect: rect(0, 0, 2, 2),
          block: titled(""),
          data: [9, 1, 1],
          max: 1,
          style: plain,
        }),
      ],
      rect(0, 0, 2, 2),
      { color: false }
    )
    expect(lines).toEqual(["", "██"])
  })

  test("list items are clipped to the block interior", () => {
    const lines = renderToLines(
      [
        Widget.List({
          rect: rect(0, 0, 6, 3),
          block: bordered("", plain),
          items: [span("abcdefgh"), span("second")],
        }),
      ],
      rect(0, 0, 6, 3),
      { color: false }
    )
    expect(lines).toEqual(["┌────┐", "│abcd│", "└────┘"])
  })

  test("paragraph spans are laid out left to right", () => {
    const lines = renderToLines(
      [
        Widget.Paragraph({
          rect: rect(1, 0, 8, 1),
          lines: [[span("Key: "), span("value", fg("green"))]],
        }),
      ],
      rect(0, 0, 9, 1),
      { color: false }
    )
    expect(lines).toEqual([" Key: val"])
  })

  test("colored output switches SGR codes on style change", () => {
    const canvas = makeCanvas(2, 1)
    drawText(canvas, 0, 0, "x", bold(fg("red")), 1)

    expect(toLines(canvas, { color: true })).toEqual([
      "\x1b[0m\x1b[1m\x1b[31mx\x1b[0m \x1b[0m",
    ])
  })
})
