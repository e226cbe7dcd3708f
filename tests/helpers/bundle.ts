import { BUNDLE_MAGIC, CHUNK_HEADER_SIZE } from "../../src/bundle.js";
import { NULL_HASH } from "../../src/backend.js";

export interface ChunkSpec {
  node: string;
  parent1: string;
  parent2?: string;
  changeset?: string;
  payload?: Buffer;
}

/** 40-hex hash made of one repeated byte, e.g. hash("ab"). */
export function hash(byte: string): string {
  return byte.repeat(20);
}

/**
 * Assemble an HG10UN changeset group. The terminator is a zero length unless
 * `terminate` is false.
 */
export function buildBundle(chunks: ChunkSpec[], terminate = true): Buffer {
  const parts: Buffer[] = [Buffer.from(BUNDLE_MAGIC, "latin1")];

  for (const chunk of chunks) {
    const payload = chunk.payload ?? Buffer.alloc(0);
    const length = Buffer.alloc(4);
    length.writeUInt32BE(CHUNK_HEADER_SIZE + payload.length);
    parts.push(
      length,
      Buffer.from(chunk.node, "hex"),
      Buffer.from(chunk.parent1, "hex"),
      Buffer.from(chunk.parent2 ?? NULL_HASH, "hex"),
      Buffer.from(chunk.changeset ?? chunk.node, "hex"),
      payload,
    );
  }

  if (terminate) parts.push(Buffer.alloc(4));
  return Buffer.concat(parts);
}
