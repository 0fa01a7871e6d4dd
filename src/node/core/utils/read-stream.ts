/**
 * Reads a byte or string stream to the end and decodes it as UTF-8.
 * Chunks are joined before decoding so multi-byte characters split across
 * chunk boundaries survive.
 */
export async function readStream(stream: AsyncIterable<Buffer | string>): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk)
  }
  return Buffer.concat(chunks).toString('utf-8')
}
