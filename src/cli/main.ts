/**
 * Disk panel CLI
 *
 * Renders the disk section of a terminal resource monitor from a metrics
 * snapshot: live read/write activity, or usage history and details for one
 * filesystem, next to a selector of every filesystem.
 *
 * Commands:
 *   render - Paint a single frame to stdout
 *   watch  - Repaint on an interval, re-reading the snapshot each tick
 *
 * Example:
 *   $ disk-panel render --snapshot fixtures/snapshot.json
 *   $ disk-panel render -s fixtures/snapshot.json --mode usage --index 1
 *   $ disk-panel watch -s /run/metrics/snapshot.json --interval 1
 */

import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Logger, LogLevel, Option } from "effect"

import * as Opts from "@cli/options"
import type { RenderOptions } from "@cli/options"
import { runRender, runWatch, withErrorHandling, AppLive } from "@cli/handler"

const toRenderOptions = (opts: {
  readonly snapshot: string
  readonly mode: "activity" | "usage"
  readonly index: number
  readonly width: Option.Option<number>
  readonly height: Option.Option<number>
  readonly zoom: number
  readonly offset: number
  readonly plain: boolean
}): RenderOptions => ({
  snapshotPath: opts.snapshot,
  mode: Opts.toDisplayMode(opts.mode),
  selectedIndex: opts.index,
  width: Option.getOrUndefined(opts.width),
  height: Option.getOrUndefined(opts.height),
  zoomFactor: opts.zoom,
  offset: opts.offset,
  plain: opts.plain,
})

const withLogLevel =
  (debug: boolean) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    debug ? Effect.provide(self, Logger.minimumLogLevel(LogLevel.Debug)) : self

const renderCommand = Command.make(
  "render",
  {
    snapshot: Opts.snapshot,
    mode: Opts.mode,
    index: Opts.index,
    width: Opts.width,
    height: Opts.height,
    zoom: Opts.zoom,
    offset: Opts.offset,
    plain: Opts.plain,
    debug: Opts.debug,
  },
  (opts) =>
    withErrorHandling(runRender(toRenderOptions(opts))).pipe(
      withLogLevel(opts.debug),
      Effect.provide(AppLive)
    )
).pipe(Command.withDescription("Paint one frame of the disk panel"))

const watchCommand = Command.make(
  "watch",
  {
    snapshot: Opts.snapshot,
    mode: Opts.mode,
    index: Opts.index,
    width: Opts.width,
    height: Opts.height,
    zoom: Opts.zoom,
    offset: Opts.offset,
    plain: Opts.plain,
    interval: Opts.interval,
    debug: Opts.debug,
  },
  (opts) =>
    withErrorHandling(runWatch(toRenderOptions(opts), opts.interval)).pipe(
      withLogLevel(opts.debug),
      Effect.provide(AppLive)
    )
).pipe(Command.withDescription("Repaint the disk panel on every refresh tick"))

const rootCommand = Command.make("disk-panel", {}).pipe(
  Command.withSubcommands([renderCommand, watchCommand]),
  Command.withDescription("Disk activity and filesystem usage panel")
)

const cli = Command.run(rootCommand, {
  name: "disk-panel",
  version: "0.1.0",
})

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
