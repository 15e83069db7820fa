/* eslint-disable no-console */
import { Context, Effect, Layer, Option } from "effect"

const ANSI = {
  home: "\x1b[H",
  clearScreen: "\x1b[2J",
  clearToEnd: "\x1b[0J",
  clearLine: "\x1b[2K",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
} as const

export interface TerminalSize {
  readonly columns: number
  readonly rows: number
}

export interface TerminalUIService {
  readonly print: (msg: string) => Effect.Effect<void>
  readonly size: () => Effect.Effect<Option.Option<TerminalSize>>
  readonly startScreen: () => Effect.Effect<void>
  /** Repaints from the top-left corner, replacing whatever the last frame drew. */
  readonly drawFrame: (lines: ReadonlyArray<string>) => Effect.Effect<void>
  readonly endScreen: () => Effect.Effect<void>
}

export class TerminalUIServiceTag extends Context.Tag("TerminalUIService")<
  TerminalUIServiceTag,
  TerminalUIService
>() {}

export const frameSequence = (lines: ReadonlyArray<string>): string =>
  ANSI.home + lines.map((line) => ANSI.clearLine + line).join("\n") + ANSI.clearToEnd

export const TerminalUIServiceLive = Layer.succeed(TerminalUIServiceTag, {
  print: (msg) => Effect.sync(() => console.log(msg)),

  size: () =>
    Effect.sync(() =>
      process.stdout.isTTY
        ? Option.some({ columns: process.stdout.columns, rows: process.stdout.rows })
        : Option.none()
    ),

  startScreen: () =>
    Effect.sync(() => {
      process.stdout.write(ANSI.hideCursor + ANSI.clearScreen)
    }),

  drawFrame: (lines) =>
    Effect.sync(() => {
      process.stdout.write(frameSequence(lines))
    }),

  endScreen: () =>
    Effect.sync(() => {
      process.stdout.write(ANSI.showCursor + "\n")
    }),
})
