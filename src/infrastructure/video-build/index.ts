export * from './cleanup/file-intermediate-cleaner.js';
export * from './container/container-file.js';
export * from './container/file-container-writer.js';
export * from './ffmpeg/execution-environment.js';
export * from './ffmpeg/ffmpeg-locator.js';
export * from './ffmpeg/ffmpeg-transcoding-invoker.js';
export * from './ffmpeg/spawn-encoder-process.js';
export * from './ffmpeg/vp9-arguments.js';
export * from './input/file-system-input-enumerator.js';
export * from './input/video-extensions.js';
