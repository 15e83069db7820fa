import { Context, Effect, Layer, Option } from "effect"
import type { ProcessInfo } from "@domain/ProcessInfo"

export interface ProcessService {
  /** `None` when the pid is unknown, e.g. the process has since exited. */
  readonly lookup: (pid: number) => Effect.Effect<Option.Option<ProcessInfo>>
}

export class ProcessServiceTag extends Context.Tag("ProcessService")<
  ProcessServiceTag,
  ProcessService
>() {}

export const makeProcessTable = (processes: ReadonlyArray<ProcessInfo>): ProcessService => {
  const byPid = new Map(processes.map((p) => [p.pid, p]))
  return {
    lookup: (pid) => Effect.sync(() => Option.fromNullable(byPid.get(pid))),
  }
}

export const ProcessServiceInMemory = (processes: ReadonlyArray<ProcessInfo>) =>
  Layer.succeed(ProcessServiceTag, makeProcessTable(processes))
