export type DisplayMode = "Activity" | "Usage"

export interface DisplayState {
  readonly mode: DisplayMode
  readonly selectedIndex: number
}
