export * from './contracts/encoder-process.js';
export * from './contracts/video-build-services.js';
export * from './entities/conversion-job.js';
export * from './value-objects/container-header.js';
export * from './value-objects/encoding-configuration.js';
export * from './value-objects/file-naming.js';
