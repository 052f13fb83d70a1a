const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8");

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

/** Decode UTF-8; invalid sequences become U+FFFD. */
export function decodeToString(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) total += chunk.length;

  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
