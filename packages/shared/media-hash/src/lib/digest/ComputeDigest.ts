import {createReadStream} from "fs";
import {createSha256Hasher} from "./CreateHasher.js";

/** 1MB read buffer: memory stays flat whatever the file size */
const READ_CHUNK_SIZE = 1024 * 1024;

export function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString("hex");
}

/**
 * sha256 of an async sequence of chunks, as lowercase hex
 */
export async function computeSha256(chunks: AsyncIterable<Uint8Array>): Promise<string> {
    const hasher = createSha256Hasher();
    for await (const chunk of chunks) {
        hasher.update(chunk);
    }
    return toHex(hasher.digest());
}

/**
 * Streaming sha256 of a file on disk
 */
export function computeFileSha256(filePath: string): Promise<string> {
    return computeSha256(createReadStream(filePath, {highWaterMark: READ_CHUNK_SIZE}));
}
