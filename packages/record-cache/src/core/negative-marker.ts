/** The reserved value written in place of a record that does not exist. */
export const NEGATIVE_MARKER = "0"

const MARKER_BYTES = new TextEncoder().encode(NEGATIVE_MARKER)

export function negativeMarkerBytes(): Uint8Array {
  return MARKER_BYTES.slice()
}

export function isNegativeMarker(bytes: Uint8Array): boolean {
  return bytes.length === MARKER_BYTES.length && bytes[0] === MARKER_BYTES[0]
}
