import sharp from "sharp";
import {dct2dLowFrequency, median} from "./Dct.js";

/** Side of the greyscale thumbnail fed to the DCT */
export const PHASH_SAMPLE_SIZE = 32;
/** 8x8 low-frequency block => 64-bit hash */
export const PHASH_BLOCK_SIZE = 8;

/**
 * Pack a bit array (MSB first) into lowercase hex
 */
export function bitsToHex(bits: boolean[]): string {
    if (bits.length % 4 !== 0) {
        throw new Error(`Bit count must be a multiple of 4, got ${bits.length}`);
    }
    let hex = '';
    for (let i = 0; i < bits.length; i += 4) {
        const nibble = (bits[i] ? 8 : 0) | (bits[i + 1] ? 4 : 0) | (bits[i + 2] ? 2 : 0) | (bits[i + 3] ? 1 : 0);
        hex += nibble.toString(16);
    }
    return hex;
}

/**
 * Hash a greyscale square sample (row-major, side PHASH_SAMPLE_SIZE).
 * A bit is set when its DCT coefficient is above the median of the 8x8 block.
 */
export function phashFromGreyscale(pixels: ArrayLike<number>): string {
    const coefficients = dct2dLowFrequency(pixels, PHASH_SAMPLE_SIZE, PHASH_BLOCK_SIZE);
    const threshold = median(coefficients);
    const bits = Array.from(coefficients, value => value > threshold);
    return bitsToHex(bits);
}

/**
 * 64-bit DCT perceptual hash of an image file or encoded image buffer.
 * Rejects when the input cannot be decoded.
 */
export async function computePhash(input: string | Buffer): Promise<string> {
    const {data, info} = await sharp(input)
        .rotate()
        .removeAlpha()
        .greyscale()
        .resize(PHASH_SAMPLE_SIZE, PHASH_SAMPLE_SIZE, {fit: 'fill'})
        .raw()
        .toBuffer({resolveWithObject: true});

    const channels = info.channels;
    const pixels = new Float64Array(PHASH_SAMPLE_SIZE * PHASH_SAMPLE_SIZE);
    for (let i = 0; i < pixels.length; i++) {
        pixels[i] = data[i * channels];
    }
    return phashFromGreyscale(pixels);
}
