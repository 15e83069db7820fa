export type Color =
  | "red"
  | "green"
  | "yellow"
  | "blue"
  | "magenta"
  | "cyan"
  | "white"
  | "gray"
  | "lightYellow"
  | "lightMagenta"

export interface Style {
  readonly fg?: Color
  readonly bold?: boolean
}

export const plain: Style = {}

export const fg = (color: Color): Style => ({ fg: color })

export const bold = (style: Style): Style => ({ ...style, bold: true })

export const sameStyle = (a: Style, b: Style): boolean =>
  a.fg === b.fg && (a.bold ?? false) === (b.bold ?? false)
