export * from './AssetStatus.js';
export * from './AssetType.js';
export * from './Asset.js';
export * from './Manifest.js';
export * from './Sidecar.js';
export * from './FileNameSanitizer.js';
export * from './Decade.js';
