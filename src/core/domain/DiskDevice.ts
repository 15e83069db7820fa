export interface DiskDevice {
  readonly name: string
  readonly mountPoint: string
  readonly fileSystem: string
  readonly sizeBytes: number
  readonly availableBytes: number
}

export const LOW_SPACE_THRESHOLD_PERCENT = 10

export const usedBytes = (disk: DiskDevice): number => disk.sizeBytes - disk.availableBytes

// A zero-sized filesystem reports as fully free so it never trips the low-space alert.
export const percentFree = (disk: DiskDevice): number =>
  disk.sizeBytes === 0 ? 100 : (disk.availableBytes * 100) / disk.sizeBytes

export const percentUsed = (disk: DiskDevice): number => 100 - percentFree(disk)

export const isLowOnSpace = (disk: DiskDevice): boolean =>
  percentFree(disk) < LOW_SPACE_THRESHOLD_PERCENT
