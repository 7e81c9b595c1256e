/**
 * Reads capture date and GPS position from the raw EXIF block sharp returns
 * (an optional "Exif\0\0" marker followed by a TIFF structure).
 */

import type { GpsPosition } from '@keepsake/archive-interface';

export interface ExifTags {
    dateTimeOriginal: string | null;
    dateTime: string | null;
    gps: GpsPosition | null;
}

const TAG_DATE_TIME = 0x0132;
const TAG_EXIF_IFD = 0x8769;
const TAG_GPS_IFD = 0x8825;
const TAG_DATE_TIME_ORIGINAL = 0x9003;
const TAG_GPS_LAT_REF = 0x0001;
const TAG_GPS_LAT = 0x0002;
const TAG_GPS_LON_REF = 0x0003;
const TAG_GPS_LON = 0x0004;

const TYPE_SIZES: Record<number, number> = { 1: 1, 2: 1, 3: 2, 4: 4, 5: 8, 7: 1, 9: 4, 10: 8 };

interface IfdEntry {
    type: number;
    count: number;
    /** Absolute position of the value bytes */
    position: number;
}

class TiffView {
    constructor(
        private readonly buffer: Buffer,
        private readonly start: number,
        private readonly littleEndian: boolean
    ) {}

    u16(position: number): number {
        return this.littleEndian ? this.buffer.readUInt16LE(position) : this.buffer.readUInt16BE(position);
    }

    u32(position: number): number {
        return this.littleEndian ? this.buffer.readUInt32LE(position) : this.buffer.readUInt32BE(position);
    }

    readIfd(offset: number): Map<number, IfdEntry> {
        const entries = new Map<number, IfdEntry>();
        const base = this.start + offset;
        const count = this.u16(base);
        for (let i = 0; i < count; i++) {
            const entry = base + 2 + i * 12;
            const type = this.u16(entry + 2);
            const valueCount = this.u32(entry + 4);
            const size = (TYPE_SIZES[type] ?? 1) * valueCount;
            const position = size <= 4 ? entry + 8 : this.start + this.u32(entry + 8);
            if (position + size > this.buffer.length) {
                throw new RangeError(`EXIF tag 0x${this.u16(entry).toString(16)} points outside the block`);
            }
            entries.set(this.u16(entry), { type, count: valueCount, position });
        }
        return entries;
    }

    ascii(entry: IfdEntry | undefined): string | null {
        if (!entry || entry.type !== 2) {
            return null;
        }
        const value = this.buffer.toString('latin1', entry.position, entry.position + entry.count).replace(/\0+$/, '').trim();
        return value === '' ? null : value;
    }

    long(entry: IfdEntry | undefined): number | null {
        if (!entry) {
            return null;
        }
        if (entry.type === 4) {
            return this.u32(entry.position);
        }
        if (entry.type === 3) {
            return this.u16(entry.position);
        }
        return null;
    }

    rationals(entry: IfdEntry | undefined): number[] | null {
        if (!entry || entry.type !== 5) {
            return null;
        }
        const values: number[] = [];
        for (let i = 0; i < entry.count; i++) {
            const numerator = this.u32(entry.position + i * 8);
            const denominator = this.u32(entry.position + i * 8 + 4);
            values.push(denominator === 0 ? NaN : numerator / denominator);
        }
        return values;
    }
}

function toDegrees(dms: number[] | null, ref: string | null, negativeRef: string): number | null {
    if (!dms || dms.length < 3 || dms.some((value) => !Number.isFinite(value))) {
        return null;
    }
    const degrees = dms[0] + dms[1] / 60 + dms[2] / 3600;
    return ref?.toUpperCase() === negativeRef ? -degrees : degrees;
}

/**
 * @throws RangeError on a truncated block
 */
export function readExif(exif: Buffer): ExifTags {
    const empty: ExifTags = { dateTimeOriginal: null, dateTime: null, gps: null };
    const start = exif.subarray(0, 6).toString('latin1') === 'Exif\0\0' ? 6 : 0;
    if (exif.length < start + 8) {
        return empty;
    }
    const order = exif.toString('latin1', start, start + 2);
    if (order !== 'II' && order !== 'MM') {
        return empty;
    }
    const view = new TiffView(exif, start, order === 'II');
    if (view.u16(start + 2) !== 42) {
        return empty;
    }

    const ifd0 = view.readIfd(view.u32(start + 4));
    const tags: ExifTags = { ...empty, dateTime: view.ascii(ifd0.get(TAG_DATE_TIME)) };

    const exifOffset = view.long(ifd0.get(TAG_EXIF_IFD));
    if (exifOffset !== null) {
        tags.dateTimeOriginal = view.ascii(view.readIfd(exifOffset).get(TAG_DATE_TIME_ORIGINAL));
    }

    const gpsOffset = view.long(ifd0.get(TAG_GPS_IFD));
    if (gpsOffset !== null) {
        const gps = view.readIfd(gpsOffset);
        const lat = toDegrees(view.rationals(gps.get(TAG_GPS_LAT)), view.ascii(gps.get(TAG_GPS_LAT_REF)), 'S');
        const lon = toDegrees(view.rationals(gps.get(TAG_GPS_LON)), view.ascii(gps.get(TAG_GPS_LON_REF)), 'W');
        if (lat !== null && lon !== null) {
            tags.gps = { lat, lon };
        }
    }
    return tags;
}
