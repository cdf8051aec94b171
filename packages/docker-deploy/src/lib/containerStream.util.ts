import { Writable } from 'node:stream';

/**
 * Streaming UTF-8 collector that keeps multibyte sequences split across chunks intact.
 */
export function createUtf8Collector(limitChars?: number) {
  const decoder = new TextDecoder('utf-8');
  const cap = limitChars ?? Number.POSITIVE_INFINITY;
  let text = '';
  let truncated = false;

  const appendDecoded = (decoded: string) => {
    if (!decoded || truncated) return;
    if (text.length + decoded.length <= cap) {
      text += decoded;
      return;
    }
    text += decoded.slice(0, Math.max(0, cap - text.length));
    truncated = true;
  };

  return {
    append(chunk: Buffer | string) {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      appendDecoded(decoder.decode(buf, { stream: true }));
    },
    flush() {
      appendDecoded(decoder.decode());
    },
    getText() {
      return text;
    },
    isTruncated() {
      return truncated;
    },
  };
}

export type Utf8Collector = ReturnType<typeof createUtf8Collector>;

/** Writable sink feeding a collector; used as a demux target. */
export function collectorSink(collector: Utf8Collector): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      collector.append(chunk);
      cb();
    },
  });
}

export async function readStreamToBuffer(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}
