import { describe, expect, test } from "vitest"
import { Effect, Option, pipe } from "effect"
import type { DiskDevice } from "@domain/DiskDevice"
import type { DisplayState } from "@domain/DisplayState"
import { SeriesKind } from "@domain/SeriesKind"
import { renderToLines } from "@render/Painter"
import { rect } from "@render/Layout"
import { fg } from "@render/Style"
import { Widget } from "@render/Widget"
import { createTestContext, type TestContext } from "@test/TestContext"
import { dataDisk, makeSnapshot, rootDisk } from "@test/fixtures"
import {
  ALERT_STYLE,
  HEALTHY_STYLE,
  SELECTOR_TITLE,
  panelRegions,
  renderDiskPanel,
  selectorEntries,
  viewForArea,
} from "./PanelDispatcher"

const area = rect(0, 0, 80, 12)
const borderStyle = fg("cyan")

const render = (ctx: TestContext, state: DisplayState, disks?: ReadonlyArray<DiskDevice>) =>
  pipe(
    renderDiskPanel({
      snapshot: makeSnapshot(disks === undefined ? {} : { disks }),
      state,
      view: viewForArea(area),
      area,
      borderStyle,
    }),
    Effect.provide(ctx.layer),
    Effect.runSync
  )

const tags = (widgets: ReadonlyArray<Widget>) => widgets.map((w) => w._tag)

describe("panelRegions", () => {
  test("fixed selector column, detail rows inside a margin", () => {
    const regions = panelRegions(area)

    expect(regions.selector).toEqual({ x: 0, y: 0, width: 30, height: 12 })
    expect(regions.detail).toEqual({ x: 30, y: 0, width: 50, height: 12 })
    expect(regions.rows).toEqual([
      { x: 31, y: 1, width: 48, height: 5 },
      { x: 31, y: 6, width: 48, height: 5 },
    ])
  })

  test("view width matches the strip width", () => {
    expect(viewForArea(area, { zoomFactor: 2 })).toEqual({ width: 48, zoomFactor: 2, offset: 0 })
  })
})

describe("selectorEntries", () => {
  test("one entry per disk with marker on the selected one", () => {
    expect(selectorEntries([rootDisk, dataDisk], 0)).toEqual([
      { text: "→ 90%: /", selected: true, alert: false },
      { text: "   5%: /data", selected: false, alert: true },
    ])
  })

  test("alert styling ignores selection", () => {
    expect(selectorEntries([rootDisk, dataDisk], 1).map((e) => e.alert)).toEqual([false, true])
  })

  test("alert threshold is strictly below ten percent free", () => {
    const disk = (available: number): DiskDevice => ({ ...rootDisk, availableBytes: available })
    expect(selectorEntries([disk(99), disk(100), disk(1000)], -1)).toEqual([
      { text: "  10%: /", selected: false, alert: true },
      { text: "  10%: /", selected: false, alert: false },
      { text: " 100%: /", selected: false, alert: false },
    ])
  })

  test("half-percent ties round to even", () => {
    const disk = (available: number): DiskDevice => ({ ...rootDisk, availableBytes: available })
    expect(selectorEntries([disk(5), disk(15), disk(25)], -1).map((e) => e.text)).toEqual([
      "   0%: /",
      "   2%: /",
      "   2%: /",
    ])
  })

  test("out-of-range selection marks nothing", () => {
    expect(selectorEntries([rootDisk, dataDisk], 5).some((e) => e.selected)).toBe(false)
  })
})

describe("PanelDispatcher", () => {
  test("usage mode draws the usage view for the selected disk", () => {
    const ctx = createTestContext()
    ctx.addSeries(SeriesKind.FileSystemUsedSpace({ name: "/dev/sda1" }), [100, 200, 150])

    const widgets = render(ctx, { mode: "Usage", selectedIndex: 0 })

    expect(tags(widgets)).toEqual(["Block", "Sparkline", "Paragraph", "Paragraph", "List"])
    expect(ctx.calls.history.map((c) => c.key)).toEqual(["fs-used:/dev/sda1"])
  })

  test("activity mode draws both strips and never consults the selection", () => {
    const ctx = createTestContext()
    ctx.addSeries(SeriesKind.IoRead(), [10, 50, 30])
    ctx.addSeries(SeriesKind.IoWrite(), [5, 5, 5])

    const widgets = render(ctx, { mode: "Activity", selectedIndex: 9 })

    expect(tags(widgets)).toEqual(["Block", "Sparkline", "Sparkline", "List"])
  })

  test("out-of-range selection still renders the full selector list", () => {
    const ctx = createTestContext()
    ctx.addSeries(SeriesKind.FileSystemUsedSpace({ name: "/dev/sda1" }), [100])

    const widgets = render(ctx, { mode: "Usage", selectedIndex: 2 })
    const [list] = widgets.filter(Widget.$is("List"))

    expect(tags(widgets)).toEqual(["Block", "List"])
    expect(list?.block.title?.text).toBe(SELECTOR_TITLE)
    expect(list?.block.borderStyle).toEqual(borderStyle)
    expect(list?.items).toEqual([
      { text: "  90%: /", style: HEALTHY_STYLE },
      { text: "   5%: /data", style: ALERT_STYLE },
    ])
  })

  test("selector lists every disk even when there are none", () => {
    const ctx = createTestContext()

    const [list] = render(ctx, { mode: "Usage", selectedIndex: 0 }, []).filter(Widget.$is("List"))

    expect(list?.items).toEqual([])
  })

  test("paints a complete frame", () => {
    const ctx = createTestContext()
    ctx.addSeries(SeriesKind.IoRead(), [10, 50, 30])
    ctx.addSeries(SeriesKind.IoWrite(), [5, 5, 5])

    const widgets = render(ctx, { mode: "Activity", selectedIndex: 1 })
    const lines = renderToLines(widgets, area, { color: false })

    expect(lines).toHaveLength(12)
    expect(lines[0]).toBe(`┌File Systems [(a)ctivity/usa┐┌Disk${"─".repeat(44)}┐`)
    expect(lines[1]?.slice(0, 30)).toBe(`│  90%: /${" ".repeat(20)}│`)
    expect(lines[2]?.slice(0, 30)).toBe(`│→  5%: /data${" ".repeat(16)}│`)
    expect(lines[1]?.slice(30)).toBe(`│R [   20 B   /s] Max [   50 B   /s]${" ".repeat(13)}│`)
    expect(lines[11]).toBe(`└${"─".repeat(28)}┘└${"─".repeat(48)}┘`)
  })

  test("top reader attribution appears in the read strip title", () => {
    const ctx = createTestContext()
    ctx.addSeries(SeriesKind.IoRead(), [10, 50, 30])
    ctx.addSeries(SeriesKind.IoWrite(), [5, 5, 5])
    ctx.addProcess({ pid: 42, name: "proc", user: "u" })

    const widgets = pipe(
      renderDiskPanel({
        snapshot: makeSnapshot({ topDiskReaderPid: Option.some(42) }),
        state: { mode: "Activity", selectedIndex: 0 },
        view: viewForArea(area),
        area,
        borderStyle,
      }),
      Effect.provide(ctx.layer),
      Effect.runSync
    )
    const [read] = widgets.filter(Widget.$is("Sparkline"))

    expect(read?.block.title?.text).toBe("R [   20 B   /s] Max [   50 B   /s] [42 - proc - u]")
  })
})
