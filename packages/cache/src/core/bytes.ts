const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

export function utf8Bytes(text: string): Uint8Array {
  return encoder.encode(text)
}

/** Throws `TypeError` on malformed input. */
export function utf8Text(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}

/** Always a fresh array. */
export function concatBytes(head: Uint8Array, tail: Uint8Array): Uint8Array {
  const out = new Uint8Array(head.byteLength + tail.byteLength)
  out.set(head, 0)
  out.set(tail, head.byteLength)

  return out
}

export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.byteLength, b.byteLength)

  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0)
    if (diff !== 0) return diff
  }

  return a.byteLength - b.byteLength
}
