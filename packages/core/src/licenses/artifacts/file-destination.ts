import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { ArtifactDestination, LicenseArtifact } from './artifact.types.js';

/**
 * Writes artifacts as files under a directory, one file per key
 */
export class FileDestination implements ArtifactDestination {
  constructor(private readonly directory: string) {}

  async write(artifact: LicenseArtifact): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const target = path.join(this.directory, artifact.fileName);
    await writeFile(target, artifact.document);
    return target;
  }
}
