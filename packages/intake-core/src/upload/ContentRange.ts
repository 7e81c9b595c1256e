import { InvalidRangeError } from '../errors/IntakeErrors.js';

/**
 * Parsed Content-Range of a chunk PUT
 * - chunk: "bytes 0-4194303/10485760"
 * - probe: "bytes *\/10485760", zero-length status query
 */
export type ContentRange =
    | { kind: 'chunk'; start: number; end: number; total: number }
    | { kind: 'probe'; total: number };

const CHUNK_PATTERN = /^bytes (\d+)-(\d+)\/(\d+)$/;
const PROBE_PATTERN = /^bytes \*\/(\d+)$/;

export function parseContentRange(header: string | undefined): ContentRange {
    if (!header) {
        throw new InvalidRangeError('Missing Content-Range header');
    }
    const value = header.trim();

    const probe = PROBE_PATTERN.exec(value);
    if (probe) {
        return { kind: 'probe', total: parseInt(probe[1], 10) };
    }

    const chunk = CHUNK_PATTERN.exec(value);
    if (!chunk) {
        throw new InvalidRangeError(`Malformed Content-Range '${value}'`);
    }
    const start = parseInt(chunk[1], 10);
    const end = parseInt(chunk[2], 10);
    const total = parseInt(chunk[3], 10);
    if (end < start) {
        throw new InvalidRangeError(`Range end ${end} is before start ${start}`);
    }
    if (end >= total) {
        throw new InvalidRangeError(`Range end ${end} is past the total size ${total}`);
    }
    return { kind: 'chunk', start, end, total };
}

/**
 * Range header of a 308 answer, absent when nothing is committed yet
 */
export function committedRangeHeader(nextOffset: number): string | null {
    return nextOffset > 0 ? `bytes=0-${nextOffset - 1}` : null;
}
