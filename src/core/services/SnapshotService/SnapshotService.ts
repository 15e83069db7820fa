import { Context, Data, Effect, Layer, ParseResult, Schema, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import type { MetricsSnapshot } from "@domain/MetricsSnapshot"
import type { ProcessInfo } from "@domain/ProcessInfo"
import { SeriesKind, seriesKey } from "@domain/SeriesKind"
import { HistoryServiceInMemory, type HistoryServiceTag } from "../HistoryService"
import { ProcessServiceInMemory, type ProcessServiceTag } from "../ProcessService"

// =============================================================================
// Errors
// =============================================================================

export class SnapshotNotFound extends Data.TaggedError("SnapshotNotFound")<{
  readonly path: string
}> {}

export class SnapshotReadFailed extends Data.TaggedError("SnapshotReadFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export class SnapshotInvalid extends Data.TaggedError("SnapshotInvalid")<{
  readonly path: string
  readonly reason: string
}> {}

export type SnapshotError = SnapshotNotFound | SnapshotReadFailed | SnapshotInvalid

// =============================================================================
// File format
// =============================================================================

const Magnitude = Schema.Number.pipe(Schema.nonNegative())
const Samples = Schema.Array(Magnitude)
const Pid = Schema.optionalWith(Schema.Int, { as: "Option", nullable: true })

const DiskDeviceSchema = Schema.Struct({
  name: Schema.String,
  mountPoint: Schema.String,
  fileSystem: Schema.String,
  sizeBytes: Magnitude,
  availableBytes: Magnitude,
}).pipe(
  Schema.filter((disk) =>
    disk.availableBytes <= disk.sizeBytes ||
    `${disk.name}: available bytes exceed filesystem size`
  )
)

const ProcessInfoSchema = Schema.Struct({
  pid: Schema.Int,
  name: Schema.String,
  user: Schema.String,
})

const HistorySchema = Schema.Struct({
  ioRead: Schema.optional(Samples),
  ioWrite: Schema.optional(Samples),
  usedSpace: Schema.optionalWith(Schema.Record({ key: Schema.String, value: Samples }), {
    default: () => ({}),
  }),
})

export const SnapshotFile = Schema.Struct({
  disks: Schema.Array(DiskDeviceSchema),
  diskRead: Magnitude,
  diskWrite: Magnitude,
  topDiskReaderPid: Pid,
  topDiskWriterPid: Pid,
  processes: Schema.optionalWith(Schema.Array(ProcessInfoSchema), { default: () => [] }),
  history: Schema.optionalWith(HistorySchema, { default: () => ({ usedSpace: {} }) }),
})

export type SnapshotFile = typeof SnapshotFile.Type

export interface LoadedSnapshot {
  readonly snapshot: MetricsSnapshot
  readonly history: ReadonlyMap<string, ReadonlyArray<number>>
  readonly processes: ReadonlyArray<ProcessInfo>
}

export const fromSnapshotFile = (file: SnapshotFile): LoadedSnapshot => {
  const history = new Map<string, ReadonlyArray<number>>()
  if (file.history.ioRead) history.set(seriesKey(SeriesKind.IoRead()), file.history.ioRead)
  if (file.history.ioWrite) history.set(seriesKey(SeriesKind.IoWrite()), file.history.ioWrite)
  for (const [name, samples] of Object.entries(file.history.usedSpace)) {
    history.set(seriesKey(SeriesKind.FileSystemUsedSpace({ name })), samples)
  }

  return {
    snapshot: {
      disks: file.disks,
      diskRead: file.diskRead,
      diskWrite: file.diskWrite,
      topDiskReaderPid: file.topDiskReaderPid,
      topDiskWriterPid: file.topDiskWriterPid,
    },
    history,
    processes: file.processes,
  }
}

export const decodeSnapshot = (
  path: string,
  text: string
): Effect.Effect<LoadedSnapshot, SnapshotInvalid> =>
  pipe(
    Schema.decodeUnknown(Schema.parseJson(SnapshotFile))(text),
    Effect.map(fromSnapshotFile),
    Effect.mapError(
      (error) =>
        new SnapshotInvalid({ path, reason: ParseResult.TreeFormatter.formatErrorSync(error) })
    )
  )

/** Collaborator layers backed by the history and process table in the file. */
export const collaboratorsLayer = (
  loaded: LoadedSnapshot
): Layer.Layer<HistoryServiceTag | ProcessServiceTag> =>
  Layer.mergeAll(HistoryServiceInMemory(loaded.history), ProcessServiceInMemory(loaded.processes))

// =============================================================================
// Service
// =============================================================================

export interface SnapshotService {
  readonly load: (path: string) => Effect.Effect<LoadedSnapshot, SnapshotError>
}

export class SnapshotServiceTag extends Context.Tag("SnapshotService")<
  SnapshotServiceTag,
  SnapshotService
>() {}

export const SnapshotServiceLive = Layer.effect(
  SnapshotServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem

    const load = (path: string): Effect.Effect<LoadedSnapshot, SnapshotError> =>
      pipe(
        fs.readFileString(path),
        Effect.mapError((error) =>
          error._tag === "SystemError" && error.reason === "NotFound"
            ? new SnapshotNotFound({ path })
            : new SnapshotReadFailed({ path, reason: error.message })
        ),
        Effect.tap((text) => Effect.logDebug(`Read ${text.length} bytes from ${path}`)),
        Effect.flatMap((text) => decodeSnapshot(path, text))
      )

    return { load }
  })
)

