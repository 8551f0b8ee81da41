/**
 * Artifact Renderer Service
 *
 * Turns an issued key into a printable SVG card: title, a PNG QR code of
 * the key, the key in plain text, and the issuer. Output depends only on
 * the key and the renderer's fixed template, so re-rendering yields the
 * same bytes.
 */

import * as QRCode from 'qrcode';
import type { LicenseRecord } from '../../database/types/license.types.js';
import { RenderError } from '../../errors/base.error.js';
import { logger } from '../../logging/logger.js';
import type {
  ArtifactDestination,
  ArtifactTemplate,
  LicenseArtifact,
  QrOptions,
} from '../artifacts/artifact.types.js';

export const DEFAULT_QR_OPTIONS: QrOptions = {
  errorCorrectionLevel: 'M',
  margin: 2,
  width: 256,
};

const PADDING = 40;
const MIN_CARD_WIDTH = 400;

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function artifactFileName(key: string): string {
  return `license-${key.replace(/[^A-Za-z0-9_-]/g, '_')}.svg`;
}

export class ArtifactRendererService {
  private readonly template: ArtifactTemplate;
  private readonly qr: QrOptions;

  constructor(template: ArtifactTemplate, qr: QrOptions = DEFAULT_QR_OPTIONS) {
    this.template = { ...template };
    this.qr = { ...qr };
  }

  /**
   * Render the printable artifact for a record
   */
  async render(record: Pick<LicenseRecord, 'key'>): Promise<LicenseArtifact> {
    const qrCode = await this.encode(record.key);
    const document = Buffer.from(this.layout(record.key, qrCode), 'utf8');

    return {
      key: record.key,
      fileName: artifactFileName(record.key),
      mimeType: 'image/svg+xml',
      qrCode,
      document,
    };
  }

  /**
   * Write an artifact to the given destination
   */
  async export(artifact: LicenseArtifact, destination: ArtifactDestination): Promise<string> {
    try {
      const location = await destination.write(artifact);
      logger.debug('License artifact exported', { location, bytes: artifact.document.length });
      return location;
    } catch (error) {
      throw new RenderError('Failed to export license artifact', error, {
        fileName: artifact.fileName,
      });
    }
  }

  private async encode(key: string): Promise<Buffer> {
    try {
      return await QRCode.toBuffer(key, {
        type: 'png',
        errorCorrectionLevel: this.qr.errorCorrectionLevel,
        margin: this.qr.margin,
        width: this.qr.width,
        color: { dark: '#000000ff', light: '#ffffffff' },
      });
    } catch (error) {
      throw new RenderError('Failed to encode license key as QR code', error, {
        keyLength: key.length,
      });
    }
  }

  private layout(key: string, qrCode: Buffer): string {
    const { width } = this.qr;
    const cardWidth = Math.max(MIN_CARD_WIDTH, width + PADDING * 2);
    const center = cardWidth / 2;
    const qrX = (cardWidth - width) / 2;
    const qrY = 80;
    const keyY = qrY + width + 50;
    const issuerY = keyY + 60;
    const cardHeight = issuerY + PADDING;

    return [
      '<?xml version="1.0" encoding="UTF-8"?>',
      `<svg xmlns="http://www.w3.org/2000/svg" width="${cardWidth}" height="${cardHeight}" viewBox="0 0 ${cardWidth} ${cardHeight}">`,
      `  <rect width="${cardWidth}" height="${cardHeight}" fill="#ffffff"/>`,
      `  <text x="${center}" y="48" text-anchor="middle" font-family="Helvetica, Arial, sans-serif" font-size="24" font-weight="bold">${escapeXml(this.template.title)}</text>`,
      `  <image x="${qrX}" y="${qrY}" width="${width}" height="${width}" href="data:image/png;base64,${qrCode.toString('base64')}"/>`,
      `  <text x="${center}" y="${keyY}" text-anchor="middle" font-family="Courier New, monospace" font-size="20">${escapeXml(key)}</text>`,
      `  <text x="${center}" y="${issuerY}" text-anchor="middle" font-family="Helvetica, Arial, sans-serif" font-size="14" fill="#555555">Issued by ${escapeXml(this.template.issuer)}</text>`,
      '</svg>',
      '',
    ].join('\n');
  }
}
