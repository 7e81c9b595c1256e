//digest
export * from './digest/SimpleHash.js';
export * from './digest/CreateHasher.js';
export * from './digest/ComputeDigest.js';

//perceptual hash
export * from './phash/Dct.js';
export * from './phash/HammingDistance.js';
export * from './phash/PerceptualHash.js';
