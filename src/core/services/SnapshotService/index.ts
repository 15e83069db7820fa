export * from "./SnapshotService"
