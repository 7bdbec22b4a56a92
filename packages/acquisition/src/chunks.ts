/**
 * Fixed-size chunking of a byte stream.
 */

export const CHUNK_SIZE = 64 * 1024;

/**
 * Regroup arbitrary stream pieces into chunks of exactly `size` bytes;
 * only the last chunk may be shorter.
 */
export async function* rechunk(
  source: AsyncIterable<Uint8Array>,
  size: number = CHUNK_SIZE
): AsyncGenerator<Buffer> {
  let pending: Buffer[] = [];
  let pendingLength = 0;

  for await (const piece of source) {
    pending.push(Buffer.from(piece.buffer, piece.byteOffset, piece.byteLength));
    pendingLength += piece.byteLength;

    if (pendingLength < size) {
      continue;
    }

    const joined = Buffer.concat(pending, pendingLength);
    let offset = 0;
    while (pendingLength - offset >= size) {
      yield joined.subarray(offset, offset + size);
      offset += size;
    }
    const rest = joined.subarray(offset);
    pending = rest.length > 0 ? [rest] : [];
    pendingLength = rest.length;
  }

  if (pendingLength > 0) {
    yield Buffer.concat(pending, pendingLength);
  }
}
