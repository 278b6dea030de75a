import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ImageStore, StoredImage } from '../../interfaces/messaging.interfaces';

const EXTENSIONS: Record<string, string> = {
  'image/png': '.png',
  'image/webp': '.webp',
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg'
};

/** Writes images under a local directory served at `/uploads`. */
export class LocalImageStore implements ImageStore {
  constructor(
    private readonly directory: string,
    private readonly publicBaseUrl: string
  ) {}

  async save(data: Buffer, contentType: string): Promise<StoredImage> {
    await fs.mkdir(this.directory, { recursive: true });

    const filename = `${uuidv4()}${EXTENSIONS[contentType] ?? '.jpg'}`;
    const filePath = path.join(this.directory, filename);

    await fs.writeFile(filePath, data);

    return {
      url: `${this.publicBaseUrl.replace(/\/$/, '')}/uploads/${filename}`,
      path: filePath
    };
  }

  /** Deleting a file that is already gone is not an error. */
  async delete(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
