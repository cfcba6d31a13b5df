/**
 * Audio Module
 *
 * Re-exports the capture capability and its ffmpeg implementation.
 */

export {
  FfmpegAudioCapture,
  CaptureError,
  isCaptureError,
  buildInputArgs,
  type AudioCapture,
  type CaptureHandle,
  type FfmpegAudioCaptureOptions,
} from './AudioCapture';

export { WAV_MIME_TYPE, mimeTypeFromFileName, readWavInfo, wavDurationMs, type WavInfo } from './audioUtils';
