/**
 * Capture artifact domain model.
 *
 * An artifact is the record of one captured image. The bytes live on disk
 * under `storage.imagesDir`; the artifact only references them. Once its
 * Job is terminal the image is kept, archived or deleted according to
 * `storage.imageRetention`.
 */

export interface Resolution {
  width: number;
  height: number;
}

export interface CaptureArtifact {
  id: string;
  deviceId: string;
  /** Absolute path of the stored image. */
  imagePath: string;
  resolution: Resolution;
  capturedAt: string;
  mimeType: string;
  byteLength: number;
  /** Hex SHA-256 of the image bytes. */
  sha256: string;
  /** Set once the image has moved to `storage.archiveDir`. */
  archivedAt?: string;
}

export function formatResolution(resolution: Resolution): string {
  return `${resolution.width}x${resolution.height}`;
}
