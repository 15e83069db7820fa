import { Options } from "@effect/cli"
import type { DisplayMode } from "@domain/DisplayState"

export const snapshot = Options.file("snapshot").pipe(
  Options.withAlias("s"),
  Options.withDescription("Path to a metrics snapshot JSON file")
)

export const mode = Options.choice("mode", ["activity", "usage"]).pipe(
  Options.withDescription("Detail pane: live I/O activity or usage of the selected filesystem"),
  Options.withDefault("activity" as const)
)

export const index = Options.integer("index").pipe(
  Options.withDescription("Index of the selected filesystem (default: 0)"),
  Options.withDefault(0)
)

export const width = Options.integer("width").pipe(
  Options.withDescription("Panel width in columns. Falls back to the terminal, then $COLUMNS."),
  Options.optional
)

export const height = Options.integer("height").pipe(
  Options.withDescription("Panel height in rows. Falls back to the terminal, then $LINES."),
  Options.optional
)

export const zoom = Options.integer("zoom").pipe(
  Options.withDescription("History samples collapsed into one column (default: 1)"),
  Options.withDefault(1)
)

export const offset = Options.integer("offset").pipe(
  Options.withDescription("Samples to scroll back from the newest (default: 0)"),
  Options.withDefault(0)
)

export const plain = Options.boolean("plain").pipe(
  Options.withDescription("Disable colors. Also implied by $NO_COLOR."),
  Options.withDefault(false)
)

export const interval = Options.integer("interval").pipe(
  Options.withDescription("Seconds between refreshes (default: 2)"),
  Options.withDefault(2)
)

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
)

export interface RenderOptions {
  readonly snapshotPath: string
  readonly mode: DisplayMode
  readonly selectedIndex: number
  readonly width: number | undefined
  readonly height: number | undefined
  readonly zoomFactor: number
  readonly offset: number
  readonly plain: boolean
}

export const toDisplayMode = (value: "activity" | "usage"): DisplayMode =>
  value === "usage" ? "Usage" : "Activity"
