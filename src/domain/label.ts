/**
 * Label domain model.
 */

export type ErrorCorrectionLevel = 'L' | 'M' | 'Q' | 'H';

/** QR encoding parameters. */
export interface EncodingProfile {
  errorCorrectionLevel: ErrorCorrectionLevel;
  /** Largest QR version (1-40) the payload may occupy. */
  maxVersion: number;
  /** Quiet zone, in modules. */
  margin: number;
  /** Pixels per module. */
  scale: number;
}

export interface Label {
  id: string;
  jobId?: string;
  externalId: string;
  title: string;
  /** Text encoded in the QR symbol. */
  payload: string;
  imagePath: string;
  profile: EncodingProfile;
  /** QR version actually used. */
  symbolVersion: number;
  generatedAt: string;
}
