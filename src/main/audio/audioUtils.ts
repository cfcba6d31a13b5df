/**
 * Audio Utility Functions
 *
 * Container helpers shared by the ffmpeg capture and the `transcribe`
 * command. Only WAV is ever parsed; other containers are passed through
 * to the provider as-is.
 */

export const WAV_MIME_TYPE = 'audio/wav';

const MIME_BY_EXTENSION: Record<string, string> = {
  '.wav': WAV_MIME_TYPE,
  '.mp3': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.mp4': 'audio/mp4',
  '.aac': 'audio/aac',
  '.ogg': 'audio/ogg',
  '.opus': 'audio/ogg',
  '.webm': 'audio/webm',
  '.flac': 'audio/flac',
};

/**
 * Map a file name to an audio MIME type by its extension.
 * Unknown extensions fall back to application/octet-stream.
 */
export function mimeTypeFromFileName(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  if (dot === -1) return 'application/octet-stream';
  return MIME_BY_EXTENSION[fileName.slice(dot).toLowerCase()] ?? 'application/octet-stream';
}

export interface WavInfo {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  byteRate: number;
  dataBytes: number;
  durationMs: number;
}

/**
 * Read the fmt and data chunks of a RIFF/WAVE buffer.
 *
 * ffmpeg leaves the data size unset (0 or 0xFFFFFFFF) when it is killed
 * before finalizing the file, so the data chunk falls back to, and is
 * clamped to, the bytes actually present.
 *
 * @returns null when the buffer is not a WAV file
 */
export function readWavInfo(buffer: Buffer): WavInfo | null {
  if (buffer.byteLength < 12) return null;
  if (buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    return null;
  }

  let offset = 12;
  let format: Omit<WavInfo, 'dataBytes' | 'durationMs'> | null = null;

  while (offset + 8 <= buffer.byteLength) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const bodyStart = offset + 8;

    if (chunkId === 'fmt ' && bodyStart + 16 <= buffer.byteLength) {
      format = {
        channels: buffer.readUInt16LE(bodyStart + 2),
        sampleRate: buffer.readUInt32LE(bodyStart + 4),
        byteRate: buffer.readUInt32LE(bodyStart + 8),
        bitsPerSample: buffer.readUInt16LE(bodyStart + 14),
      };
    } else if (chunkId === 'data') {
      if (!format || format.byteRate === 0) return null;
      const remaining = buffer.byteLength - bodyStart;
      const declared = chunkSize === 0 || chunkSize === 0xffffffff ? remaining : chunkSize;
      const dataBytes = Math.min(declared, remaining);
      return {
        ...format,
        dataBytes,
        durationMs: Math.round((dataBytes / format.byteRate) * 1000),
      };
    }

    // Chunks are word-aligned
    offset = bodyStart + chunkSize + (chunkSize % 2);
  }

  return null;
}

/**
 * Duration of a WAV buffer in milliseconds, or 0 when it cannot be read.
 */
export function wavDurationMs(buffer: Buffer): number {
  return readWavInfo(buffer)?.durationMs ?? 0;
}
