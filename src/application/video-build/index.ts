export * from './commands/build-videos.command.js';
export * from './dto/build-videos.dto.js';
export * from './handlers/build-videos.handler.js';
