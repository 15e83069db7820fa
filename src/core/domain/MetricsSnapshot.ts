import type { Option } from "effect"
import type { DiskDevice } from "./DiskDevice"

/**
 * Point-in-time metrics handed to the panel for one frame. Current rates are
 * supplied by the collector and are not derived from the history window.
 */
export interface MetricsSnapshot {
  readonly disks: ReadonlyArray<DiskDevice>
  readonly diskRead: number
  readonly diskWrite: number
  readonly topDiskReaderPid: Option.Option<number>
  readonly topDiskWriterPid: Option.Option<number>
}
