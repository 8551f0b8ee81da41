/**
 * Artifact Configuration Schema
 *
 * Template text and QR encoding options for printable license artifacts.
 */

import { z } from 'zod';

export const artifactConfigSchema = z.object({
  title: z.string().min(1).default('License Certificate'),
  issuer: z.string().min(1).default('Keymint'),
  qr: z.object({
    errorCorrectionLevel: z.enum(['L', 'M', 'Q', 'H']).default('M'),
    margin: z.coerce.number().int().min(0).max(16).default(2),
    width: z.coerce.number().int().min(64).max(2048).default(256),
  }),
  outputDirectory: z.string().default('./artifacts'),
});

export type ArtifactConfig = z.infer<typeof artifactConfigSchema>;
