import { Effect, Option } from "effect"
import type { MetricsSnapshot } from "@domain/MetricsSnapshot"
import { attributionLabel } from "@domain/ProcessInfo"
import { SeriesKind } from "@domain/SeriesKind"
import type { View } from "@domain/View"
import { formatBytes } from "@lib/formatBytes"
import { center } from "@lib/text"
import type { Rect } from "@render/Layout"
import { fg, type Style } from "@render/Style"
import { Widget, titled } from "@render/Widget"
import { HistoryServiceTag } from "@services/HistoryService"
import { ProcessServiceTag } from "@services/ProcessService"

export const READ_STYLE: Style = fg("lightYellow")
export const WRITE_STYLE: Style = fg("lightMagenta")

export interface ActivityViewInput {
  readonly snapshot: MetricsSnapshot
  readonly view: View
  readonly rows: readonly [Rect, Rect]
}

/** Peak of the window, 1 for an empty window. */
export const seriesMaximum = (samples: ReadonlyArray<number>): number =>
  samples.length === 0 ? 1 : samples.reduce((max, v) => (v > max ? v : max), samples[0] ?? 0)

export const scaleDenominator = (peak: number): number => Math.max(1, peak)

export const resolveAttribution = (
  pid: Option.Option<number>
): Effect.Effect<string, never, ProcessServiceTag> =>
  Option.match(pid, {
    onNone: () => Effect.succeed(""),
    onSome: (id) =>
      Effect.gen(function* () {
        const processes = yield* ProcessServiceTag
        const found = yield* processes.lookup(id)
        if (Option.isNone(found)) {
          yield* Effect.logDebug(`Top disk process ${id} no longer exists`)
          return ""
        }
        return attributionLabel(found.value)
      }),
  })

export const activityTitle = (
  direction: "R" | "W",
  current: number,
  peak: number,
  attribution: string
): string =>
  `${direction} [${center(formatBytes(current), 10)}/s] Max [${center(formatBytes(peak), 10)}/s] ${attribution}`

interface StripInput {
  readonly direction: "R" | "W"
  readonly current: number
  readonly samples: ReadonlyArray<number>
  readonly topPid: Option.Option<number>
  readonly style: Style
  readonly rect: Rect
}

const activityStrip = (input: StripInput) =>
  Effect.gen(function* () {
    const peak = seriesMaximum(input.samples)
    const attribution = yield* resolveAttribution(input.topPid)
    return Widget.Sparkline({
      rect: input.rect,
      block: titled(activityTitle(input.direction, input.current, peak, attribution)),
      data: input.samples,
      max: scaleDenominator(peak),
      style: input.style,
    })
  })

/**
 * Read and write throughput strips, each scaled to its own window peak.
 * Draws both or neither: if either series is missing nothing is returned.
 */
export const renderActivityView = (
  input: ActivityViewInput
): Effect.Effect<ReadonlyArray<Widget>, never, HistoryServiceTag | ProcessServiceTag> =>
  Effect.gen(function* () {
    const history = yield* HistoryServiceTag
    const { snapshot, view, rows } = input

    const read = yield* history.lookup(SeriesKind.IoRead(), view)
    if (Option.isNone(read)) {
      yield* Effect.logDebug("Read history unavailable, skipping activity view")
      return []
    }

    const write = yield* history.lookup(SeriesKind.IoWrite(), view)
    if (Option.isNone(write)) {
      yield* Effect.logDebug("Write history unavailable, skipping activity view")
      return []
    }

    const readStrip = yield* activityStrip({
      direction: "R",
      current: snapshot.diskRead,
      samples: read.value,
      topPid: snapshot.topDiskReaderPid,
      style: READ_STYLE,
      rect: rows[0],
    })
    const writeStrip = yield* activityStrip({
      direction: "W",
      current: snapshot.diskWrite,
      samples: write.value,
      topPid: snapshot.topDiskWriterPid,
      style: WRITE_STYLE,
      rect: rows[1],
    })

    return [readStrip, writeStrip]
  })
