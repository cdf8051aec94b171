import { Buffer } from 'node:buffer';
import { Readable } from 'node:stream';
import { extract, pack } from 'tar-stream';

/**
 * Create a tar archive Buffer containing a single UTF-8 text file.
 * The resulting tarball is suitable for docker putArchive.
 */
export async function createSingleFileTar(filename: string, content: string): Promise<Buffer> {
  if (!filename) throw new Error('filename is required');
  const tar = pack();

  const entryPromise = new Promise<void>((resolve, reject) => {
    const buf = Buffer.from(content, 'utf8');
    tar.entry({ name: filename, size: buf.length, mode: 0o644 }, buf, (err?: Error | null) => {
      if (err) return reject(err);
      tar.finalize();
      resolve();
    });
  });

  const collectPromise = collectTar(Readable.from(tar));
  await entryPromise;
  return collectPromise;
}

/**
 * Reads the entry named `name` out of a tar archive. Leading `./` and trailing `/`
 * are ignored when comparing names. Returns `undefined` when the entry is absent.
 */
export function readTarEntry(archive: Buffer, name: string): Promise<Buffer | undefined> {
  const target = normalizeEntryName(name);
  return new Promise((resolve, reject) => {
    const ex = extract();
    let found: Buffer | undefined;

    ex.on('entry', (header, stream, next) => {
      const matches = header.type === 'file' && normalizeEntryName(header.name) === target;
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => {
        if (matches) chunks.push(chunk);
      });
      stream.on('end', () => {
        if (matches) found = Buffer.concat(chunks);
        next();
      });
      stream.on('error', reject);
      stream.resume();
    });
    ex.on('finish', () => resolve(found));
    ex.on('error', reject);
    ex.end(archive);
  });
}

export function normalizeEntryName(name: string): string {
  return name.replace(/^\.\//, '').replace(/\/+$/, '');
}

function collectTar(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  return new Promise<Buffer>((resolve, reject) => {
    stream
      .on('data', (c: Buffer | string) => chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(String(c))))
      .on('error', (e: unknown) => reject(e instanceof Error ? e : new Error(String(e))))
      .on('end', () => resolve(Buffer.concat(chunks)));
  });
}
