import { Effect } from "effect"
import { isLowOnSpace, percentFree, type DiskDevice } from "@domain/DiskDevice"
import type { DisplayState } from "@domain/DisplayState"
import type { MetricsSnapshot } from "@domain/MetricsSnapshot"
import { makeView, type View } from "@domain/View"
import { roundHalfEven } from "@lib/round"
import { Length, Min, Percentage, split, type Rect } from "@render/Layout"
import { bold, fg, type Style } from "@render/Style"
import { Widget, bordered, span } from "@render/Widget"
import type { HistoryServiceTag } from "@services/HistoryService"
import type { ProcessServiceTag } from "@services/ProcessService"
import { renderActivityView } from "./ActivityView"
import { renderUsageView } from "./UsageView"

export const SELECTOR_WIDTH = 30
export const SELECTOR_TITLE = "File Systems [(a)ctivity/usage]"
export const DETAIL_TITLE = "Disk"

export const ALERT_STYLE: Style = bold(fg("red"))
export const HEALTHY_STYLE: Style = fg("green")

export interface DiskPanelInput {
  readonly snapshot: MetricsSnapshot
  readonly state: DisplayState
  readonly view: View
  readonly area: Rect
  readonly borderStyle: Style
}

export interface SelectorEntry {
  readonly text: string
  readonly selected: boolean
  readonly alert: boolean
}

export interface PanelRegions {
  readonly selector: Rect
  readonly detail: Rect
  readonly rows: readonly [Rect, Rect]
}

export const panelRegions = (area: Rect): PanelRegions => {
  const [selector = area, detail = area] = split(area, {
    direction: "horizontal",
    constraints: [Length(SELECTOR_WIDTH), Min(10)],
  })
  const [top = detail, bottom = detail] = split(detail, {
    direction: "vertical",
    constraints: [Percentage(50), Percentage(50)],
    margin: 1,
  })
  return { selector, detail, rows: [top, bottom] }
}

/** View sized to the strips the panel will draw inside `area`. */
export const viewForArea = (
  area: Rect,
  options: { readonly zoomFactor?: number; readonly offset?: number } = {}
): View => makeView({ ...options, width: panelRegions(area).rows[0].width })

export const selectorEntries = (
  disks: ReadonlyArray<DiskDevice>,
  selectedIndex: number
): ReadonlyArray<SelectorEntry> =>
  disks.map((disk, i) => {
    const selected = i === selectedIndex
    const marker = selected ? "→" : " "
    return {
      text: `${marker}${String(roundHalfEven(percentFree(disk))).padStart(3)}%: ${disk.mountPoint}`,
      selected,
      alert: isLowOnSpace(disk),
    }
  })

export const renderSelectorList = (
  disks: ReadonlyArray<DiskDevice>,
  selectedIndex: number,
  area: Rect,
  borderStyle: Style
): Widget =>
  Widget.List({
    rect: area,
    block: bordered(SELECTOR_TITLE, borderStyle),
    items: selectorEntries(disks, selectedIndex).map((entry) =>
      span(entry.text, entry.alert ? ALERT_STYLE : HEALTHY_STYLE)
    ),
  })

const renderDetail = (
  input: DiskPanelInput,
  rows: readonly [Rect, Rect]
): Effect.Effect<ReadonlyArray<Widget>, never, HistoryServiceTag | ProcessServiceTag> => {
  const { snapshot, state, view } = input
  switch (state.mode) {
    case "Activity":
      return renderActivityView({ snapshot, view, rows })
    case "Usage":
      return renderUsageView({
        disks: snapshot.disks,
        selectedIndex: state.selectedIndex,
        view,
        rows,
      })
  }
}

/**
 * Disk panel for one frame: a filesystem selector on the left and, on the
 * right, either live I/O activity or usage details for the selected
 * filesystem.
 */
export const renderDiskPanel = (
  input: DiskPanelInput
): Effect.Effect<ReadonlyArray<Widget>, never, HistoryServiceTag | ProcessServiceTag> =>
  Effect.gen(function* () {
    const { snapshot, state, area, borderStyle } = input
    const regions = panelRegions(area)
    const detail = yield* renderDetail(input, regions.rows)

    return [
      Widget.Block({ rect: regions.detail, block: bordered(DETAIL_TITLE, borderStyle) }),
      ...detail,
      renderSelectorList(snapshot.disks, state.selectedIndex, regions.selector, borderStyle),
    ]
  })
