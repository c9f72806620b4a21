import { randomUUID } from 'crypto';
import { ValidationError } from '../../domain/errors.js';

export interface StoredImage {
  key: string;
  url: string;
}

export interface ImageStorage {
  put(key: string, body: Buffer, contentType: string): Promise<StoredImage>;
}

export interface UploadImageCommand {
  body: Buffer;
  contentType: string;
  folder?: string;
}

const EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/svg+xml': 'svg',
  'image/avif': 'avif',
  'image/x-icon': 'ico',
};

const FOLDER_PATTERN = /^[a-z0-9][a-z0-9_-]*$/i;
const SUBTYPE_PATTERN = /^[a-z0-9]+$/;

export function extensionFor(contentType: string): string {
  const known = EXTENSIONS[contentType];
  if (known) {
    return known;
  }
  // The subtype ends up in the object key
  const subtype = contentType.slice('image/'.length).split('+')[0];
  return SUBTYPE_PATTERN.test(subtype) ? subtype : 'bin';
}

export class UploadImageUseCase {
  constructor(private storage: ImageStorage) {}

  async execute(command: UploadImageCommand): Promise<{ url: string }> {
    const contentType = command.contentType.split(';')[0].trim().toLowerCase();
    if (!contentType.startsWith('image/')) {
      throw new ValidationError('Only image uploads are accepted', 'contentType');
    }
    if (command.body.length === 0) {
      throw new ValidationError('Image body is empty', 'body');
    }

    const folder = command.folder ?? 'uploads';
    if (!FOLDER_PATTERN.test(folder)) {
      throw new ValidationError('Folder may only contain letters, digits, "-" and "_"', 'folder');
    }

    const key = `${folder}/${randomUUID()}.${extensionFor(contentType)}`;
    const stored = await this.storage.put(key, command.body, contentType);
    return { url: stored.url };
  }
}
