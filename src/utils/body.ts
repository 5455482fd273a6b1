// src/utils/body.ts

import { Readable } from 'stream';

/**
 * Parse a response body that may arrive already parsed, as text, as a buffer,
 * or as an unread stream. Unparseable text yields undefined.
 */
export async function parseBody(data: unknown): Promise<unknown> {
  let text: string;
  if (typeof data === 'string') {
    text = data;
  } else if (Buffer.isBuffer(data)) {
    text = data.toString('utf8');
  } else if (data instanceof Readable) {
    text = await readStream(data);
  } else {
    return data;
  }

  if (text.trim() === '') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}
