/**
 * Upload Progress Tracker
 *
 * Process-local, in-memory view of uploads in flight, keyed by a client-chosen
 * upload id. Entries live only as long as the upload request. Nothing here is
 * persisted or consulted for access decisions.
 */

export interface UploadProgress {
  uploadId: string;
  ownerId: string;
  receivedBytes: number;
  expectedBytes: number | null;
  startedAt: Date;
}

export interface UploadProgressTracker {
  start: (
    uploadId: string,
    ownerId: string,
    expectedBytes: number | null
  ) => void;
  advance: (uploadId: string, bytes: number) => void;
  finish: (uploadId: string) => void;
  get: (uploadId: string) => UploadProgress | null;
}

export function createUploadProgressTracker(
  now: () => Date = () => new Date()
): UploadProgressTracker {
  const uploads = new Map<string, UploadProgress>();

  return {
    start(uploadId, ownerId, expectedBytes) {
      uploads.set(uploadId, {
        uploadId,
        ownerId,
        receivedBytes: 0,
        expectedBytes,
        startedAt: now(),
      });
    },

    advance(uploadId, bytes) {
      const entry = uploads.get(uploadId);
      if (entry !== undefined) {
        entry.receivedBytes += bytes;
      }
    },

    finish(uploadId) {
      uploads.delete(uploadId);
    },

    get(uploadId) {
      const entry = uploads.get(uploadId);
      return entry === undefined ? null : { ...entry };
    },
  };
}

/**
 * Percentage complete, or null when the total size is unknown
 */
export function getProgressPercent(progress: UploadProgress): number | null {
  if (progress.expectedBytes === null || progress.expectedBytes <= 0) {
    return null;
  }
  return Math.min(
    100,
    Math.floor((progress.receivedBytes / progress.expectedBytes) * 100)
  );
}

/**
 * Wrap a byte source so every chunk is reported before it is passed on
 */
export async function* withProgress(
  source: AsyncIterable<Uint8Array>,
  onChunk: (bytes: number) => void
): AsyncGenerator<Uint8Array> {
  for await (const chunk of source) {
    onChunk(chunk.byteLength);
    yield chunk;
  }
}
