/**
 * Time window handed to the history store. The panel passes it through
 * untouched; only the store interprets the fields.
 */
export interface View {
  readonly width: number
  readonly zoomFactor: number
  readonly offset: number
}

export const makeView = (options: Partial<View> = {}): View => ({
  width: Math.max(0, Math.floor(options.width ?? 0)),
  zoomFactor: Math.max(1, Math.floor(options.zoomFactor ?? 1)),
  offset: Math.max(0, Math.floor(options.offset ?? 0)),
})
