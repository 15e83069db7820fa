import { Match } from "effect"

import type { SnapshotError } from "@services/SnapshotService"

export class AppError extends Error {
  readonly _tag = "AppError"

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`)
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`,
    ].join("\n")
  }
}

const errors = {
  snapshotNotFound: (path: string) =>
    new AppError(
      "Snapshot not found",
      `No snapshot file exists at "${path}".`,
      `Check the --snapshot path. The collector writes a fresh snapshot on every polling cycle.`
    ),

  snapshotReadFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot read snapshot",
      `Failed to read "${path}": ${reason}`,
      `Check that you have read permission on the snapshot file.`
    ),

  snapshotInvalid: (path: string, reason: string) =>
    new AppError(
      "Snapshot file invalid",
      `"${path}" is not a valid metrics snapshot:\n${reason}`,
      `Make sure the file is JSON with disks, diskRead and diskWrite fields.`
    ),

  invalidArea: (width: number, height: number) =>
    new AppError(
      "Panel too small",
      `A ${width}x${height} panel has no room to draw.`,
      `Pass --width and --height of at least 1, or run inside a terminal.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),
}

const matchSnapshotError = Match.typeTags<SnapshotError>()({
  SnapshotNotFound: (e) => errors.snapshotNotFound(e.path),
  SnapshotReadFailed: (e) => errors.snapshotReadFailed(e.path, e.reason),
  SnapshotInvalid: (e) => errors.snapshotInvalid(e.path, e.reason),
})

const SNAPSHOT_TAGS: ReadonlyArray<string> = ["SnapshotNotFound", "SnapshotReadFailed", "SnapshotInvalid"]

const isSnapshotError = (e: unknown): e is SnapshotError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  SNAPSHOT_TAGS.includes(e._tag)

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error
  }

  if (isSnapshotError(error)) {
    return matchSnapshotError(error)
  }

  if (error instanceof Error) {
    return errors.unexpected(error.message)
  }

  return errors.unexpected(String(error))
}

export const { snapshotNotFound, snapshotReadFailed, snapshotInvalid, invalidArea, unexpected } =
  errors
