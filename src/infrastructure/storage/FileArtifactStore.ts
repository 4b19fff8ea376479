import crypto from 'crypto';
import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { validate as isUuid } from 'uuid';
import { z } from 'zod';
import type { IArtifactStore, StoredArtifact } from '../../core/interfaces/IArtifactStore.js';

const ANSWER_FILE = 'answer.toml';
const MANIFEST_FILE = 'artifact.json';

const ManifestSchema = z.object({
  jobId: z.string(),
  imagePath: z.string(),
  sizeBytes: z.number().int().nonnegative(),
  sha256: z.string(),
  registeredAt: z.string(),
});

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function sha256File(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    fs.createReadStream(filePath)
      .on('data', (chunk) => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolve(hash.digest('hex')));
  });
}

export function imageFileName(jobId: string): string {
  return `auto-installer-${jobId}.iso`;
}

/**
 * Artifact store on the local filesystem:
 * <root>/<jobId>/answer.toml, <root>/<jobId>/auto-installer-<jobId>.iso, <root>/<jobId>/artifact.json
 */
export class FileArtifactStore implements IArtifactStore {
  constructor(private root: string) {}

  getRoot(): string {
    return this.root;
  }

  private jobDir(jobId: string): string {
    // Job ids become path segments
    if (!isUuid(jobId)) {
      throw new Error(`Invalid job id: ${jobId}`);
    }
    return path.join(this.root, jobId);
  }

  private async ensureJobDir(jobId: string): Promise<string> {
    const dir = this.jobDir(jobId);
    await fsp.mkdir(dir, { recursive: true });
    return dir;
  }

  async saveAnswerFile(jobId: string, contents: string): Promise<string> {
    const dir = await this.ensureJobDir(jobId);
    const filePath = path.join(dir, ANSWER_FILE);
    await fsp.writeFile(filePath, contents, 'utf8');
    return filePath;
  }

  async readAnswerFile(jobId: string): Promise<string | null> {
    if (!isUuid(jobId)) return null;
    try {
      return await fsp.readFile(path.join(this.jobDir(jobId), ANSWER_FILE), 'utf8');
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  }

  async imageOutputPath(jobId: string): Promise<string> {
    const dir = await this.ensureJobDir(jobId);
    return path.join(dir, imageFileName(jobId));
  }

  async registerImage(jobId: string, imagePath: string): Promise<StoredArtifact> {
    const dir = await this.ensureJobDir(jobId);
    const stat = await fsp.stat(imagePath);

    const sha256 = await sha256File(imagePath);

    const artifact: StoredArtifact = {
      jobId,
      imagePath,
      sizeBytes: stat.size,
      sha256,
      registeredAt: new Date(),
    };

    await fsp.writeFile(
      path.join(dir, MANIFEST_FILE),
      JSON.stringify({ ...artifact, registeredAt: artifact.registeredAt.toISOString() }, null, 2),
      'utf8'
    );
    return artifact;
  }

  async getArtifact(jobId: string): Promise<StoredArtifact | null> {
    if (!isUuid(jobId)) return null;
    let text: string;
    try {
      text = await fsp.readFile(path.join(this.jobDir(jobId), MANIFEST_FILE), 'utf8');
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }

    const manifest = ManifestSchema.parse(JSON.parse(text));
    return { ...manifest, registeredAt: new Date(manifest.registeredAt) };
  }

  async delete(jobId: string): Promise<boolean> {
    if (!isUuid(jobId)) return false;
    try {
      await fsp.rm(this.jobDir(jobId), { recursive: true });
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }
}
