export interface ProcessInfo {
  readonly pid: number
  readonly name: string
  readonly user: string
}

export const attributionLabel = (process: ProcessInfo): string =>
  `[${process.pid} - ${process.name} - ${process.user}]`
