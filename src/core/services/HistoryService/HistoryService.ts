import { Context, Effect, Layer, Option } from "effect"
import { seriesKey, type SeriesKind } from "@domain/SeriesKind"
import type { View } from "@domain/View"

// =============================================================================
// Service interface
// =============================================================================

export interface HistoryService {
  /** Samples for `kind` inside `view`, or `None` when the series is not tracked. */
  readonly lookup: (
    kind: SeriesKind,
    view: View
  ) => Effect.Effect<Option.Option<ReadonlyArray<number>>>
}

export class HistoryServiceTag extends Context.Tag("HistoryService")<
  HistoryServiceTag,
  HistoryService
>() {}

// =============================================================================
// In-memory implementation
// =============================================================================

/**
 * Cuts the zoomed window out of a full history: the newest
 * `width * zoomFactor` samples ending `offset` samples back, with each
 * `zoomFactor` chunk collapsed to its peak.
 */
export const windowSamples = (
  samples: ReadonlyArray<number>,
  view: View
): ReadonlyArray<number> => {
  const zoom = Math.max(1, view.zoomFactor)
  const end = Math.max(0, samples.length - view.offset)
  const start = Math.max(0, end - view.width * zoom)
  const window = samples.slice(start, end)
  if (zoom === 1) return window

  const chunks: number[] = []
  for (let i = 0; i < window.length; i += zoom) {
    chunks.push(Math.max(...window.slice(i, i + zoom)))
  }
  return chunks
}

export const makeInMemoryHistory = (
  series: ReadonlyMap<string, ReadonlyArray<number>>
): HistoryService => ({
  lookup: (kind, view) =>
    Effect.sync(() =>
      Option.map(Option.fromNullable(series.get(seriesKey(kind))), (samples) =>
        windowSamples(samples, view)
      )
    ),
})

export const HistoryServiceInMemory = (series: ReadonlyMap<string, ReadonlyArray<number>>) =>
  Layer.succeed(HistoryServiceTag, makeInMemoryHistory(series))
