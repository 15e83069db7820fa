import { Config, Console, Duration, Effect, Layer, Option, Schedule, pipe } from "effect"

import type { RenderOptions } from "./options"
import { fromDomainError, invalidArea } from "./errors"

import { renderDiskPanel, viewForArea } from "@panel/PanelDispatcher"
import { rect, type Rect } from "@render/Layout"
import { renderToLines } from "@render/Painter"
import { fg } from "@render/Style"
import {
  SnapshotServiceLive,
  SnapshotServiceTag,
  collaboratorsLayer,
} from "@services/SnapshotService"
import { TerminalUIServiceLive, TerminalUIServiceTag } from "@services/TerminalUIService"

const DEFAULT_COLUMNS = 100
const DEFAULT_ROWS = 24
const BORDER_STYLE = fg("cyan")

/**
 * Error handling wrapper for CLI commands
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return Console.error(`\n${appError.format()}`)
    }),
    Effect.asVoid
  )

const envInteger = (name: string) =>
  pipe(
    Config.integer(name),
    Config.option,
    Effect.orElseSucceed(() => Option.none<number>())
  )

/**
 * Panel size: explicit options first, then the attached terminal, then
 * $COLUMNS / $LINES, then 100x24.
 */
export const resolveArea = (options: Pick<RenderOptions, "width" | "height">) =>
  Effect.gen(function* () {
    const ui = yield* TerminalUIServiceTag
    const terminal = yield* ui.size()
    const columns = yield* envInteger("COLUMNS")
    const lines = yield* envInteger("LINES")

    const width =
      options.width ??
      Option.getOrUndefined(Option.map(terminal, (t) => t.columns)) ??
      Option.getOrElse(columns, () => DEFAULT_COLUMNS)
    const height =
      options.height ??
      Option.getOrUndefined(Option.map(terminal, (t) => t.rows)) ??
      Option.getOrElse(lines, () => DEFAULT_ROWS)

    if (width < 1 || height < 1) {
      return yield* Effect.fail(invalidArea(width, height))
    }
    return rect(0, 0, width, height)
  })

export const useColor = (plain: boolean) =>
  pipe(
    Config.string("NO_COLOR"),
    Config.option,
    Effect.orElseSucceed(() => Option.none<string>()),
    Effect.map((noColor) => !plain && Option.isNone(noColor))
  )

/**
 * Loads the snapshot and paints one frame of the disk panel.
 */
export const renderFrame = (options: RenderOptions, area: Rect) =>
  Effect.gen(function* () {
    const snapshots = yield* SnapshotServiceTag
    const loaded = yield* snapshots.load(options.snapshotPath)
    yield* Effect.logDebug(
      `Rendering ${options.mode} view of ${loaded.snapshot.disks.length} filesystems at ${area.width}x${area.height}`
    )

    const widgets = yield* pipe(
      renderDiskPanel({
        snapshot: loaded.snapshot,
        state: { mode: options.mode, selectedIndex: options.selectedIndex },
        view: viewForArea(area, { zoomFactor: options.zoomFactor, offset: options.offset }),
        area,
        borderStyle: BORDER_STYLE,
      }),
      Effect.provide(collaboratorsLayer(loaded))
    )

    const color = yield* useColor(options.plain)
    return renderToLines(widgets, area, { color })
  })

/**
 * Run the render command
 */
export const runRender = (options: RenderOptions) =>
  Effect.gen(function* () {
    const ui = yield* TerminalUIServiceTag
    const area = yield* resolveArea(options)
    const lines = yield* renderFrame(options, area)
    yield* ui.print(lines.join("\n"))
  })

/**
 * Run the watch command: re-read the snapshot and repaint on every tick.
 */
export const runWatch = (options: RenderOptions, intervalSeconds: number) =>
  Effect.gen(function* () {
    const ui = yield* TerminalUIServiceTag
    const tick = pipe(
      resolveArea(options),
      Effect.flatMap((area) => renderFrame(options, area)),
      Effect.flatMap(ui.drawFrame)
    )

    yield* Effect.logDebug(`Refreshing every ${intervalSeconds}s`)
    yield* ui.startScreen()
    return yield* pipe(
      tick,
      Effect.repeat(Schedule.spaced(Duration.seconds(Math.max(1, intervalSeconds)))),
      Effect.ensuring(ui.endScreen())
    )
  })

export const AppLive = Layer.mergeAll(SnapshotServiceLive, TerminalUIServiceLive)
