/**
 * Printable artifact produced for an issued license
 */
export interface LicenseArtifact {
  key: string;
  fileName: string;
  mimeType: 'image/svg+xml';
  /** PNG raster of the QR code encoding the key */
  qrCode: Buffer;
  /** The complete printable document */
  document: Buffer;
}

export interface ArtifactTemplate {
  title: string;
  issuer: string;
}

export interface QrOptions {
  errorCorrectionLevel: 'L' | 'M' | 'Q' | 'H';
  margin: number;
  width: number;
}

/**
 * Where an exported artifact goes. Passed to each export call, never kept
 * by the renderer.
 */
export interface ArtifactDestination {
  /** Write the artifact and return where it ended up */
  write(artifact: LicenseArtifact): Promise<string>;
}
