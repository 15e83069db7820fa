import { Data } from "effect"

/**
 * Selects which history series to query: aggregate read or write throughput,
 * or the used-space history of one filesystem keyed by device name.
 */
export type SeriesKind = Data.TaggedEnum<{
  IoRead: {}
  IoWrite: {}
  FileSystemUsedSpace: { readonly name: string }
}>

export const SeriesKind = Data.taggedEnum<SeriesKind>()

export const seriesKey: (kind: SeriesKind) => string = SeriesKind.$match({
  IoRead: () => "io-read",
  IoWrite: () => "io-write",
  FileSystemUsedSpace: ({ name }) => `fs-used:${name}`,
})
