/**
 * Reads whatever was piped into the process. A terminal on stdin means
 * nothing was piped.
 */

export interface StdinLike extends AsyncIterable<string | Buffer> {
  isTTY?: boolean;
}

export async function readPipedStdin(stream: StdinLike = process.stdin): Promise<string | null> {
  if (stream.isTTY) return null;
  // Decode once at the end: a multi-byte character may span two chunks.
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}
