export type { DiskDevice } from "./domain/DiskDevice"
export {
  LOW_SPACE_THRESHOLD_PERCENT,
  isLowOnSpace,
  percentFree,
  percentUsed,
  usedBytes,
} from "./domain/DiskDevice"
export type { DisplayMode, DisplayState } from "./domain/DisplayState"
export type { MetricsSnapshot } from "./domain/MetricsSnapshot"
export type { ProcessInfo } from "./domain/ProcessInfo"
export { SeriesKind, seriesKey } from "./domain/SeriesKind"
export type { View } from "./domain/View"
export { makeView } from "./domain/View"

export { formatBytes, type ByteUnit } from "./lib/formatBytes"

export type { Constraint, Direction, Rect } from "./render/Layout"
export { Length, Min, Percentage, inner, rect, split } from "./render/Layout"
export type { Color, Style } from "./render/Style"
export { Widget, type BlockSpec, type Line, type Span } from "./render/Widget"
export { makeCanvas, paint, renderToLines, toLines } from "./render/Painter"

export {
  renderDiskPanel,
  renderSelectorList,
  selectorEntries,
  panelRegions,
  viewForArea,
  type DiskPanelInput,
  type SelectorEntry,
} from "./panel/PanelDispatcher"
export { renderActivityView, seriesMaximum, resolveAttribution } from "./panel/ActivityView"
export { renderUsageView } from "./panel/UsageView"

export {
  HistoryServiceTag,
  HistoryServiceInMemory,
  makeInMemoryHistory,
  type HistoryService,
} from "./services/HistoryService"
export {
  ProcessServiceTag,
  ProcessServiceInMemory,
  makeProcessTable,
  type ProcessService,
} from "./services/ProcessService"
export type {
  SnapshotNotFound,
  SnapshotReadFailed,
  SnapshotInvalid,
  SnapshotError,
  LoadedSnapshot,
} from "./services/SnapshotService"
export { SnapshotServiceTag, SnapshotServiceLive, decodeSnapshot } from "./services/SnapshotService"
