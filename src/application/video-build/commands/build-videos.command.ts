import type { BuildVideosPayload } from '../dto/build-videos.dto.js';

export class BuildVideosCommand {
  public readonly payload: BuildVideosPayload;

  public constructor(payload: BuildVideosPayload) {
    this.payload = payload;
  }
}
