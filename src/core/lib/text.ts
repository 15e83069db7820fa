/** Centers `text` in `width` columns, extra padding going to the right. */
export const center = (text: string, width: number): string => {
  const pad = width - [...text].length
  if (pad <= 0) return text
  const left = Math.floor(pad / 2)
  return " ".repeat(left) + text + " ".repeat(pad - left)
}
