import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ExifToolDescriptionWriter,
  withDescriptionWriter,
  type DescriptionWriter,
  type ExifToolClient,
} from './description-writer.js';
import { WriteError } from './errors.js';

function createExifTool(existing?: string) {
  const read = vi.fn().mockResolvedValue(existing === undefined ? {} : { Description: existing });
  const write = vi.fn().mockResolvedValue({ warnings: [] });
  const end = vi.fn().mockResolvedValue(undefined);
  const client: ExifToolClient = { read, write, end };
  return { client, read, write, end };
}

describe('ExifToolDescriptionWriter', () => {
  let exiftool: ReturnType<typeof createExifTool>;

  beforeEach(() => {
    exiftool = createExifTool();
  });

  it('should write the description into an existing file', async () => {
    const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

    const status = await writer.write({
      targetPath: '/shots/IMG_0001.jpg',
      description: 'A red barn.',
      action: 'write-existing',
    });

    expect(status).toBe('written');
    expect(exiftool.read).toHaveBeenCalledWith('/shots/IMG_0001.jpg');
    expect(exiftool.write).toHaveBeenCalledWith(
      '/shots/IMG_0001.jpg',
      { Description: 'A red barn.' },
      { writeArgs: [] }
    );
  });

  it('should create a sidecar from the raw file with -out', async () => {
    const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

    const status = await writer.write({
      targetPath: '/shots/IMG_0001.xmp',
      description: 'A red barn.',
      action: 'create-sidecar',
      anchorPath: '/shots/IMG_0001.ARW',
    });

    expect(status).toBe('written');
    expect(exiftool.read).toHaveBeenCalledWith('/shots/IMG_0001.ARW');
    expect(exiftool.write).toHaveBeenCalledWith(
      '/shots/IMG_0001.ARW',
      { Description: 'A red barn.' },
      { writeArgs: ['-out', '/shots/IMG_0001.xmp'] }
    );
  });

  it('should pass -overwrite_original when backups are turned off', async () => {
    const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client, overwriteOriginals: true });

    await writer.write({ targetPath: '/shots/IMG_0001.xmp', description: 'Barn', action: 'write-existing' });

    expect(exiftool.write).toHaveBeenCalledWith(
      '/shots/IMG_0001.xmp',
      { Description: 'Barn' },
      { writeArgs: ['-overwrite_original'] }
    );
  });

  it('should leave a matching description alone', async () => {
    exiftool = createExifTool('A red barn.');
    const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

    const status = await writer.write({
      targetPath: '/shots/IMG_0001.xmp',
      description: 'A red barn.',
      action: 'write-existing',
    });

    expect(status).toBe('unchanged');
    expect(exiftool.write).not.toHaveBeenCalled();
  });

  it('should keep a different existing description by default', async () => {
    exiftool = createExifTool('Someone else wrote this.');
    const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

    const status = await writer.write({
      targetPath: '/shots/IMG_0001.xmp',
      description: 'A red barn.',
      action: 'write-existing',
    });

    expect(status).toBe('skipped-existing');
    expect(exiftool.write).not.toHaveBeenCalled();
  });

  it('should replace a different description when asked to', async () => {
    exiftool = createExifTool('Someone else wrote this.');
    const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client, overwriteDescriptions: true });

    const status = await writer.write({
      targetPath: '/shots/IMG_0001.xmp',
      description: 'A red barn.',
      action: 'write-existing',
    });

    expect(status).toBe('written');
    expect(exiftool.write).toHaveBeenCalledTimes(1);
  });

  it('should wrap exiftool failures in a WriteError', async () => {
    exiftool.write.mockRejectedValueOnce(new Error('Error: File not found'));
    const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

    const result = writer.write({
      targetPath: '/shots/IMG_0001.jpg',
      description: 'A red barn.',
      action: 'write-existing',
    });

    await expect(result).rejects.toBeInstanceOf(WriteError);
    await expect(result).rejects.toMatchObject({
      targetPath: '/shots/IMG_0001.jpg',
      writeCode: 'WRITE_FAILED',
      message: 'Error writing description for /shots/IMG_0001.jpg: Error: File not found',
    });
  });

  it('should wrap read failures in a WriteError', async () => {
    exiftool.read.mockRejectedValueOnce(new Error('unreadable'));
    const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

    await expect(
      writer.write({ targetPath: '/shots/IMG_0001.jpg', description: 'x', action: 'write-existing' })
    ).rejects.toThrowError('Error reading existing description from /shots/IMG_0001.jpg: unreadable');
    expect(exiftool.write).not.toHaveBeenCalled();
  });

  it('should refuse to create a sidecar without its raw file', async () => {
    const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

    await expect(
      writer.write({ targetPath: '/shots/IMG_0001.xmp', description: 'x', action: 'create-sidecar' })
    ).rejects.toBeInstanceOf(WriteError);
    expect(exiftool.read).not.toHaveBeenCalled();
  });

  describe('inspect', () => {
    it('should report a pending write without writing', async () => {
      const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

      const status = await writer.inspect({
        targetPath: '/shots/IMG_0001.xmp',
        description: 'A red barn.',
        action: 'create-sidecar',
        anchorPath: '/shots/IMG_0001.ARW',
      });

      expect(status).toBe('would-write');
      expect(exiftool.read).toHaveBeenCalledWith('/shots/IMG_0001.ARW');
      expect(exiftool.write).not.toHaveBeenCalled();
    });

    it('should report a matching description as unchanged', async () => {
      exiftool = createExifTool('A red barn.');
      const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

      const status = await writer.inspect({
        targetPath: '/shots/IMG_0001.xmp',
        description: 'A red barn.',
        action: 'write-existing',
      });

      expect(status).toBe('unchanged');
      expect(exiftool.write).not.toHaveBeenCalled();
    });

    it('should report a different description as kept', async () => {
      exiftool = createExifTool('Someone else wrote this.');
      const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

      const status = await writer.inspect({
        targetPath: '/shots/IMG_0001.xmp',
        description: 'A red barn.',
        action: 'write-existing',
      });

      expect(status).toBe('skipped-existing');
      expect(exiftool.write).not.toHaveBeenCalled();
    });

    it('should report a write when overwriting descriptions', async () => {
      exiftool = createExifTool('Someone else wrote this.');
      const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client, overwriteDescriptions: true });

      const status = await writer.inspect({
        targetPath: '/shots/IMG_0001.xmp',
        description: 'A red barn.',
        action: 'write-existing',
      });

      expect(status).toBe('would-write');
      expect(exiftool.write).not.toHaveBeenCalled();
    });

    it('should wrap read failures in a WriteError', async () => {
      exiftool.read.mockRejectedValueOnce(new Error('unreadable'));
      const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

      await expect(
        writer.inspect({ targetPath: '/shots/IMG_0001.jpg', description: 'x', action: 'write-existing' })
      ).rejects.toThrowError('Error reading existing description from /shots/IMG_0001.jpg: unreadable');
    });
  });

  it('should end the exiftool process on close', async () => {
    const writer = new ExifToolDescriptionWriter({ exiftool: exiftool.client });

    await writer.close();

    expect(exiftool.end).toHaveBeenCalledTimes(1);
  });
});

describe('withDescriptionWriter', () => {
  function fakeWriter() {
    const close = vi.fn().mockResolvedValue(undefined);
    const writer: DescriptionWriter = {
      write: vi.fn().mockResolvedValue('written'),
      inspect: vi.fn().mockResolvedValue('would-write'),
      close,
    };
    return { writer, close };
  }

  it('should close the writer after use', async () => {
    const { writer, close } = fakeWriter();

    const result = await withDescriptionWriter(() => writer, async () => 'done');

    expect(result).toBe('done');
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should close the writer when use fails', async () => {
    const { writer, close } = fakeWriter();

    await expect(
      withDescriptionWriter(
        () => writer,
        async () => {
          throw new Error('boom');
        }
      )
    ).rejects.toThrowError('boom');
    expect(close).toHaveBeenCalledTimes(1);
  });
});
