export type EncoderDeadline = 'realtime' | 'good' | 'best';

export interface EncodingConfiguration {
  /** VP9 constant quality; lower is better. */
  readonly crf: number;
  readonly deadline: EncoderDeadline;
  readonly cpuUsed: number;
  /** Keep the audio track, re-encoded as Opus. */
  readonly audio: boolean;
  readonly audioBitrateKbps: number;
  /** Overwrite the intermediate and the final container when they already exist. */
  readonly force: boolean;
}
