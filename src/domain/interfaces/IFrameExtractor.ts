/**
 * Port for the external still-frame extraction process
 */

export interface FrameExtractionRequest {
  inputPath: string;
  outputPath: string;
  // Target position; implementations clamp it to the clip duration
  seekSeconds: number;
  width: number;
  quality: number;
  timeoutMs: number;
}

export interface IFrameExtractor {
  /**
   * Writes a single JPEG frame of inputPath to outputPath.
   * Rejects with a MediaError subclass describing why extraction failed.
   */
  extract(request: FrameExtractionRequest): Promise<void>;
}
