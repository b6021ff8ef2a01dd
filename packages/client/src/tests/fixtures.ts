import sharp from 'sharp';
import { createServer as createNetServer } from 'net';
import { generateCertificate, type CertificatePair } from '@fileconv/server';

let certificate: CertificatePair | undefined;

export function testCertificate(): CertificatePair {
  certificate ??= generateCertificate({ days: 1 });
  return certificate;
}

export async function makeImage(width: number, height: number, format: 'png' | 'jpeg' = 'png'): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 20, g: 120, b: 220 } },
  })
    .toFormat(format)
    .toBuffer();
}

export async function dimensionsOf(data: Uint8Array): Promise<{ format?: string; width?: number; height?: number }> {
  const { format, width, height } = await sharp(data).metadata();
  return { format, width, height };
}

/** A port nothing is listening on. */
export async function closedPort(): Promise<number> {
  const server = createNetServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  const port = address && typeof address !== 'string' ? address.port : 0;
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}
