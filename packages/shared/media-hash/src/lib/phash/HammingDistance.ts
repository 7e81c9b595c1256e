const PHASH_PATTERN = /^[0-9a-f]{16}$/;

export function isPhash(value: string): boolean {
    return PHASH_PATTERN.test(value);
}

/**
 * Number of differing bits between two 64-bit hashes in hex form
 */
export function hammingDistance(a: string, b: string): number {
    const left = a.toLowerCase();
    const right = b.toLowerCase();
    if (!isPhash(left) || !isPhash(right)) {
        throw new Error(`Invalid 64-bit hash: '${a}' / '${b}'`);
    }
    let xor = BigInt(`0x${left}`) ^ BigInt(`0x${right}`);
    let distance = 0;
    while (xor > 0n) {
        distance += Number(xor & 1n);
        xor >>= 1n;
    }
    return distance;
}

export function isNearDuplicate(a: string, b: string, threshold: number): boolean {
    return hammingDistance(a, b) <= threshold;
}
