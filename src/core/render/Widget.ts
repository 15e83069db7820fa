import { Data } from "effect"
import type { Rect } from "./Layout"
import { plain, type Style } from "./Style"

export interface Span {
  readonly text: string
  readonly style: Style
}

export type Line = ReadonlyArray<Span>

export interface BlockSpec {
  readonly title?: Span
  readonly borders: boolean
  readonly borderStyle: Style
}

/**
 * One node of a rendered panel. A panel is an ordered list of these; later
 * nodes paint over earlier ones.
 */
export type Widget = Data.TaggedEnum<{
  Block: { readonly rect: Rect; readonly block: BlockSpec }
  List: { readonly rect: Rect; readonly block: BlockSpec; readonly items: ReadonlyArray<Span> }
  Sparkline: {
    readonly rect: Rect
    readonly block: BlockSpec
    readonly data: ReadonlyArray<number>
    readonly max: number
    readonly style: Style
  }
  Paragraph: { readonly rect: Rect; readonly lines: ReadonlyArray<Line> }
}>

export const Widget = Data.taggedEnum<Widget>()

export const span = (text: string, style: Style = plain): Span => ({ text, style })

export const titled = (title: string, style: Style = plain): BlockSpec => ({
  title: span(title, style),
  borders: false,
  borderStyle: plain,
})

export const bordered = (title: string, borderStyle: Style): BlockSpec => ({
  title: span(title, borderStyle),
  borders: true,
  borderStyle,
})

export const lineText = (line: Line): string => line.map((s) => s.text).join("")
