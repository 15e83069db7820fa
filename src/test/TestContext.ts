import { Effect, Layer, Option } from "effect"
import { FileSystem } from "@effect/platform"
import { SystemError } from "@effect/platform/Error"

import { seriesKey, type SeriesKind } from "@domain/SeriesKind"
import type { View } from "@domain/View"
import type { ProcessInfo } from "@domain/ProcessInfo"
import { HistoryServiceTag } from "@services/HistoryService"
import { ProcessServiceTag } from "@services/ProcessService"

export interface CallLog {
  history: Array<{ method: "lookup"; key: string; view: View }>
  process: Array<{ method: "lookup"; pid: number }>
  fileSystem: Array<{ method: string; path: string }>
}

export interface TestContext {
  series: Map<string, ReadonlyArray<number>>
  processes: Map<number, ProcessInfo>
  files: Map<string, string>
  calls: CallLog
  addSeries: (kind: SeriesKind, samples: ReadonlyArray<number>) => void
  addProcess: (process: ProcessInfo) => void
  addFile: (path: string, contents: string) => void
  /**
   * History samples are returned as stored; the view is only recorded, so
   * tests see exactly the samples they registered.
   */
  layer: Layer.Layer<HistoryServiceTag | ProcessServiceTag | FileSystem.FileSystem>
}

export function createTestContext(): TestContext {
  const series = new Map<string, ReadonlyArray<number>>()
  const processes = new Map<number, ProcessInfo>()
  const files = new Map<string, string>()

  const calls: CallLog = {
    history: [],
    process: [],
    fileSystem: [],
  }

  const mockHistoryService = Layer.succeed(HistoryServiceTag, {
    lookup: (kind, view) =>
      Effect.sync(() => {
        const key = seriesKey(kind)
        calls.history.push({ method: "lookup", key, view })
        return Option.fromNullable(series.get(key))
      }),
  })

  const mockProcessService = Layer.succeed(ProcessServiceTag, {
    lookup: (pid) =>
      Effect.sync(() => {
        calls.process.push({ method: "lookup", pid })
        return Option.fromNullable(processes.get(pid))
      }),
  })

  const mockFileSystem = FileSystem.layerNoop({
    readFileString: (path: string) => {
      calls.fileSystem.push({ method: "readFileString", path })
      const contents = files.get(path)
      if (contents === undefined) {
        return Effect.fail(
          new SystemError({
            reason: "NotFound",
            module: "FileSystem",
            method: "readFileString",
            pathOrDescriptor: path,
          })
        )
      }
      return Effect.succeed(contents)
    },
  })

  return {
    series,
    processes,
    files,
    calls,
    addSeries: (kind, samples) => {
      series.set(seriesKey(kind), samples)
    },
    addProcess: (process) => {
      processes.set(process.pid, process)
    },
    addFile: (path, contents) => {
      files.set(path, contents)
    },
    layer: Layer.mergeAll(mockHistoryService, mockProcessService, mockFileSystem),
  }
}
