export interface SimpleHash {
    update(data: Uint8Array): SimpleHash;

    digest(): Uint8Array;
}
