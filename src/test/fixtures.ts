import { Option } from "effect"
import type { DiskDevice } from "@domain/DiskDevice"
import type { MetricsSnapshot } from "@domain/MetricsSnapshot"

export const rootDisk: DiskDevice = {
  name: "/dev/sda1",
  mountPoint: "/",
  fileSystem: "ext4",
  sizeBytes: 1000,
  availableBytes: 900,
}

export const dataDisk: DiskDevice = {
  name: "/dev/sdb1",
  mountPoint: "/data",
  fileSystem: "xfs",
  sizeBytes: 1000,
  availableBytes: 50,
}

export const makeSnapshot = (overrides: Partial<MetricsSnapshot> = {}): MetricsSnapshot => ({
  disks: [rootDisk, dataDisk],
  diskRead: 20,
  diskWrite: 5,
  topDiskReaderPid: Option.none(),
  topDiskWriterPid: Option.none(),
  ...overrides,
})
