import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '../../../domain/errors.js';
import { FakeImageStorage } from '../../../test/fakes.js';
import { extensionFor, UploadImageUseCase } from '../uploadImage.js';

describe('UploadImageUseCase', () => {
  let storage: FakeImageStorage;
  let useCase: UploadImageUseCase;

  beforeEach(() => {
    storage = new FakeImageStorage();
    useCase = new UploadImageUseCase(storage);
  });

  it('should store the image under the folder with a generated name', async () => {
    const body = Buffer.from([0x89, 0x50, 0x4e, 0x47]);

    const result = await useCase.execute({ body, contentType: 'image/png', folder: 'projects' });

    expect(storage.stored).toHaveLength(1);
    const [stored] = storage.stored;
    expect(stored.key).toMatch(/^projects\/[0-9a-f-]{36}\.png$/);
    expect(stored.contentType).toBe('image/png');
    expect(stored.body).toBe(body);
    expect(result).toEqual({ url: `https://cdn.test/${stored.key}` });
  });

  it('should default to the uploads folder', async () => {
    await useCase.execute({ body: Buffer.from('x'), contentType: 'image/jpeg; charset=binary' });

    expect(storage.stored[0].key).toMatch(/^uploads\/[0-9a-f-]{36}\.jpg$/);
    expect(storage.stored[0].contentType).toBe('image/jpeg');
  });

  it('should reject non-image content', async () => {
    await expect(
      useCase.execute({ body: Buffer.from('%PDF'), contentType: 'application/pdf' })
    ).rejects.toThrow('Only image uploads are accepted');
    expect(storage.stored).toHaveLength(0);
  });

  it('should reject an empty body', async () => {
    await expect(
      useCase.execute({ body: Buffer.alloc(0), contentType: 'image/png' })
    ).rejects.toThrow(ValidationError);
  });

  it('should reject folder names with path separators', async () => {
    await expect(
      useCase.execute({ body: Buffer.from('x'), contentType: 'image/png', folder: '../etc' })
    ).rejects.toThrow(ValidationError);
  });

  it('should derive extensions from the content type', () => {
    expect(extensionFor('image/svg+xml')).toBe('svg');
    expect(extensionFor('image/x-icon')).toBe('ico');
    expect(extensionFor('image/tiff')).toBe('tiff');
    expect(extensionFor('image/')).toBe('bin');
  });

  it('should not let the content type add path segments to the key', async () => {
    await useCase.execute({ body: Buffer.from('x'), contentType: 'image/../../etc' });

    expect(storage.stored[0].key).toMatch(/^uploads\/[0-9a-f-]{36}\.bin$/);
  });
});
