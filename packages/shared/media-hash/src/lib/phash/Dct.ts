/**
 * Low-frequency corner of a 2-D DCT-II.
 * Only the first `keep` coefficients on each axis are computed.
 *
 * @param pixels row-major square matrix of side `size`
 * @returns row-major `keep`x`keep` coefficients
 */
export function dct2dLowFrequency(pixels: ArrayLike<number>, size: number, keep: number): Float64Array {
    if (pixels.length !== size * size) {
        throw new Error(`Expected ${size * size} pixels, got ${pixels.length}`);
    }
    const cosTable = new Float64Array(keep * size);
    for (let u = 0; u < keep; u++) {
        for (let x = 0; x < size; x++) {
            cosTable[u * size + x] = Math.cos(((2 * x + 1) * u * Math.PI) / (2 * size));
        }
    }

    // rows first: rowPass[y][u]
    const rowPass = new Float64Array(size * keep);
    for (let y = 0; y < size; y++) {
        for (let u = 0; u < keep; u++) {
            let sum = 0;
            for (let x = 0; x < size; x++) {
                sum += pixels[y * size + x] * cosTable[u * size + x];
            }
            rowPass[y * keep + u] = sum;
        }
    }

    // then columns: out[v][u]
    const out = new Float64Array(keep * keep);
    for (let v = 0; v < keep; v++) {
        for (let u = 0; u < keep; u++) {
            let sum = 0;
            for (let y = 0; y < size; y++) {
                sum += rowPass[y * keep + u] * cosTable[v * size + y];
            }
            out[v * keep + u] = sum;
        }
    }
    return out;
}

export function median(values: ArrayLike<number>): number {
    const sorted = Array.from(values).sort((a, b) => a - b);
    if (sorted.length === 0) {
        throw new Error('median of empty set');
    }
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}
