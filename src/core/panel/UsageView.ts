import { Effect, Option } from "effect"
import { percentFree, percentUsed, usedBytes, type DiskDevice } from "@domain/DiskDevice"
import { SeriesKind } from "@domain/SeriesKind"
import type { View } from "@domain/View"
import { formatBytes } from "@lib/formatBytes"
import { center } from "@lib/text"
import { Percentage, split, type Rect } from "@render/Layout"
import { fg, plain, type Style } from "@render/Style"
import { Widget, span, titled, type Line } from "@render/Widget"
import { HistoryServiceTag } from "@services/HistoryService"

export const USED_SPACE_STYLE: Style = fg("lightYellow")
export const VALUE_STYLE: Style = fg("green")

const LABEL_WIDTH = 23

export interface UsageViewInput {
  readonly disks: ReadonlyArray<DiskDevice>
  readonly selectedIndex: number
  readonly view: View
  readonly rows: readonly [Rect, Rect]
}

export const selectedDisk = (
  disks: ReadonlyArray<DiskDevice>,
  index: number
): Option.Option<DiskDevice> =>
  Number.isInteger(index) && index >= 0 ? Option.fromNullable(disks[index]) : Option.none()

export const usageTitle = (disk: DiskDevice): string =>
  `${disk.name}  ↓Used [${center(formatBytes(usedBytes(disk)), 10)} (${percentUsed(disk).toFixed(1)}%)]` +
  ` Free [${center(formatBytes(disk.availableBytes), 10)} (${percentFree(disk).toFixed(1)}%)]` +
  ` Size [${center(formatBytes(disk.sizeBytes), 10)}]`

const fact = (label: string, value: string): Line => [
  span(label.padEnd(LABEL_WIDTH), plain),
  span(value, VALUE_STYLE),
]

export const identityFacts = (disk: DiskDevice): ReadonlyArray<Line> => [
  fact("Name:", disk.name),
  fact("File System:", disk.fileSystem),
  fact("Mount Point:", disk.mountPoint),
]

export const sizeFacts = (disk: DiskDevice): ReadonlyArray<Line> => [
  fact("Size:", formatBytes(disk.sizeBytes)),
  fact("Used:", formatBytes(usedBytes(disk))),
  fact("Free:", formatBytes(disk.availableBytes)),
]

/**
 * Used-space history for the selected filesystem, scaled to its capacity,
 * followed by identity and size facts side by side. Renders nothing when the
 * selection is out of range or the filesystem has no history yet.
 */
export const renderUsageView = (
  input: UsageViewInput
): Effect.Effect<ReadonlyArray<Widget>, never, HistoryServiceTag> =>
  Effect.gen(function* () {
    const disk = selectedDisk(input.disks, input.selectedIndex)
    if (Option.isNone(disk)) {
      yield* Effect.logDebug(`No filesystem at index ${input.selectedIndex}`)
      return []
    }
    const fs = disk.value

    const history = yield* HistoryServiceTag
    const used = yield* history.lookup(SeriesKind.FileSystemUsedSpace({ name: fs.name }), input.view)
    if (Option.isNone(used)) {
      yield* Effect.logDebug(`No used-space history for ${fs.name}`)
      return []
    }

    const [left, right] = split(input.rows[1], {
      direction: "horizontal",
      constraints: [Percentage(50), Percentage(50)],
      margin: 1,
    })

    const widgets: Widget[] = [
      Widget.Sparkline({
        rect: input.rows[0],
        block: titled(usageTitle(fs)),
        data: used.value,
        max: Math.max(1, fs.sizeBytes),
        style: USED_SPACE_STYLE,
      }),
    ]
    if (left !== undefined) widgets.push(Widget.Paragraph({ rect: left, lines: identityFacts(fs) }))
    if (right !== undefined) widgets.push(Widget.Paragraph({ rect: right, lines: sizeFacts(fs) }))
    return widgets
  })
