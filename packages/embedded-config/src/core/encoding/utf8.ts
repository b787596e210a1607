const decoder = new TextDecoder("utf-8", { fatal: true })

export type DecodeResult = { ok: true; text: string } | { ok: false; byteOffset: number }

/**
 * Decodes UTF-8 bytes, reporting the offset of the first invalid byte on
 * failure. A leading byte order mark is dropped.
 */
export function decodeUtf8(bytes: Uint8Array): DecodeResult {
  try {
    return { ok: true, text: decoder.decode(bytes) }
  } catch (err) {
    if (!(err instanceof TypeError)) throw err

    return { ok: false, byteOffset: validUpTo(bytes) }
  }
}

/**
 * Length of the longest prefix of `bytes` that is valid UTF-8. A sequence cut
 * short by the end of input counts as invalid from its lead byte.
 */
export function validUpTo(bytes: Uint8Array): number {
  let i = 0

  while (i < bytes.length) {
    const width = sequenceLength(bytes, i)

    if (width === 0) return i
    i += width
  }

  return bytes.length
}

// Returns 0 when the sequence starting at `start` is malformed or truncated.
function sequenceLength(bytes: Uint8Array, start: number): number {
  const lead = bytes[start]

  if (lead < 0x80) return 1

  let width: number
  let min = 0x80
  let max = 0xbf

  if (lead >= 0xc2 && lead <= 0xdf) {
    width = 2
  } else if (lead >= 0xe0 && lead <= 0xef) {
    width = 3
    if (lead === 0xe0) min = 0xa0
    if (lead === 0xed) max = 0x9f
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    width = 4
    if (lead === 0xf0) min = 0x90
    if (lead === 0xf4) max = 0x8f
  } else {
    return 0
  }

  if (start + width > bytes.length) return 0

  const second = bytes[start + 1]
  if (second < min || second > max) return 0

  for (let k = 2; k < width; k++) {
    const next = bytes[start + k]
    if (next < 0x80 || next > 0xbf) return 0
  }

  return width
}
