import { promises as fsp } from 'fs';
import path from 'path';

const mockParse = jest.fn();
jest.mock('exifr', () => ({
  __esModule: true,
  default: { parse: (...args: unknown[]) => mockParse(...args) },
}));

import { decodeTagText, ImageScanner } from '../../src/inventory/scanner.js';
import { loadSidecarSchema } from '../../src/sidecar/schema.js';
import type { SidecarSchema } from '../../src/sidecar/schema.js';
import { MetadataStore } from '../../src/sidecar/store.js';
import { makeTempDir, removeDir, SCHEMA_PATH, writeImage, writeSidecar } from '../helpers/gallery.js';

function utf16(text: string): number[] {
  return Array.from(Buffer.from(`${text}\0`, 'utf16le'));
}

describe('decodeTagText', () => {
  it('trims strings and trailing NULs', () => {
    expect(decodeTagText('ImageDescription', '  A cat\0\0')).toBe('A cat');
  });

  it('decodes Windows XP tags as UCS-2', () => {
    expect(decodeTagText('XPTitle', utf16('Sunset'))).toBe('Sunset');
  });

  it('honours the UserComment charset header', () => {
    const ascii = Buffer.concat([Buffer.from('ASCII\0\0\0', 'latin1'), Buffer.from('Hello')]);
    const unicode = Buffer.concat([Buffer.from('UNICODE\0', 'latin1'), Buffer.from('Héllo', 'utf16le')]);
    expect(decodeTagText('UserComment', new Uint8Array(ascii))).toBe('Hello');
    expect(decodeTagText('UserComment', new Uint8Array(unicode))).toBe('Héllo');
  });

  it('gives an empty string for values that are not text', () => {
    expect(decodeTagText('ImageDescription', 42)).toBe('');
    expect(decodeTagText('ImageDescription', undefined)).toBe('');
  });
});

describe('ImageScanner', () => {
  let dir: string;
  let schema: SidecarSchema;
  let scanner: ImageScanner;

  beforeAll(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    schema = loadSidecarSchema(SCHEMA_PATH);
  });

  beforeEach(async () => {
    jest.spyOn(console, 'error').mockImplementation(() => {});
    jest.spyOn(console, 'debug').mockImplementation(() => {});
    mockParse.mockReset();
    mockParse.mockResolvedValue(undefined);
    dir = await makeTempDir('scanner-');
    scanner = new ImageScanner(dir, new MetadataStore(dir, schema), schema);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(dir);
  });

  describe('listImages', () => {
    it('keeps allowed image files only, sorted', async () => {
      await writeImage(dir, 'dog.PNG');
      await writeImage(dir, 'cat.jpg');
      await writeImage(dir, 'notes.txt');
      await writeSidecar(dir, 'cat.json', {});
      await fsp.mkdir(path.join(dir, 'folder.jpg'));

      expect(Array.from(await scanner.listImages())).toEqual(['cat.jpg', 'dog.PNG']);
    });

    it('follows symlinks to files', async () => {
      await writeImage(dir, 'real.jpg');
      await fsp.symlink(path.join(dir, 'real.jpg'), path.join(dir, 'alias.jpg'));
      await fsp.symlink(path.join(dir, 'gone.jpg'), path.join(dir, 'dangling.jpg'));

      expect(Array.from(await scanner.listImages())).toEqual(['alias.jpg', 'real.jpg']);
    });

    it('returns an empty set when the directory cannot be read', async () => {
      const result = await scanner.listImages(path.join(dir, 'nope'));
      expect(result.size).toBe(0);
      expect(console.error).toHaveBeenCalled();
    });
  });

  describe('extractFallbackHints', () => {
    it('reads title and description tags', async () => {
      mockParse.mockResolvedValue({ ImageDescription: '  A cat  ', XPTitle: utf16('Whiskers') });
      await writeImage(dir, 'cat.jpg');

      expect(await scanner.extractFallbackHints('cat.jpg')).toEqual({ title: 'Whiskers', description: 'A cat' });
      expect(mockParse).toHaveBeenCalledWith(path.join(dir, 'cat.jpg'), expect.objectContaining({ tiff: true, exif: true }));
    });

    it('prefers the first non-empty tag', async () => {
      mockParse.mockResolvedValue({ ImageDescription: '   ', XPComment: utf16('From comment') });
      expect(await scanner.extractFallbackHints('cat.jpg')).toEqual({ description: 'From comment' });
    });

    it('swallows decoding errors', async () => {
      mockParse.mockRejectedValue(new Error('Unknown file format'));
      expect(await scanner.extractFallbackHints('cat.jpg')).toEqual({});
    });
  });

  describe('loadMetadata', () => {
    it('uses hints only for keys the sidecar does not have', async () => {
      await writeImage(dir, 'cat.jpg');
      await writeSidecar(dir, 'cat.json', { title: '' });
      mockParse.mockResolvedValue({ XPTitle: utf16('Hint title'), ImageDescription: 'Hint description' });

      const record = await scanner.loadMetadata('cat.jpg');

      expect(record.title).toBe('');
      expect(record.description).toBe('Hint description');
    });

    it('skips embedded metadata when both keys are stored', async () => {
      await writeImage(dir, 'cat.jpg');
      await writeSidecar(dir, 'cat.json', { title: 'A', description: 'B' });

      await scanner.loadMetadata('cat.jpg');

      expect(mockParse).not.toHaveBeenCalled();
    });

    it('falls back to the image mtime for detected_at and is idempotent', async () => {
      await writeImage(dir, 'cat.jpg');
      await fsp.utimes(path.join(dir, 'cat.jpg'), 1600000000, 1600000000);

      const first = await scanner.loadMetadata('cat.jpg');
      const second = await scanner.loadMetadata('cat.jpg');

      expect(first.detected_at).toBe(1600000000);
      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });

    it('backfills defaults for a corrupt sidecar', async () => {
      await writeImage(dir, 'cat.jpg');
      await writeSidecar(dir, 'cat.json', '{"title":');
      jest.spyOn(console, 'warn').mockImplementation(() => {});

      const record = await scanner.loadMetadata('cat.jpg');

      expect(record).toMatchObject({ title: '', description: '', reviewed: false, ai_generated: false, tags: [] });
    });
  });
});
