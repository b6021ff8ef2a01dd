import sharp from 'sharp';
import { connect } from 'tls';
import { generateCertificate, type CertificatePair } from '../certs.js';

let certificate: CertificatePair | undefined;

/** One throwaway key pair per test file; RSA generation is slow. */
export function testCertificate(): CertificatePair {
  certificate ??= generateCertificate({ keySize: 2048, days: 1 });
  return certificate;
}

export async function makeImage(
  width: number,
  height: number,
  format: 'png' | 'jpeg' = 'png',
): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 40, b: 90 } },
  })
    .toFormat(format)
    .toBuffer();
}

/**
 * Minimal PDF whose page `i` (0-based) is `(i + 1) * pageWidth` points wide,
 * so page order is visible in the rendered widths.
 */
export function makePdf(pageCount: number, pageWidth = 100, pageHeight = 50): Buffer {
  const kids = Array.from({ length: pageCount }, (_, i) => `${i + 3} 0 R`).join(' ');
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${kids}] /Count ${pageCount} >>`,
    ...Array.from(
      { length: pageCount },
      (_, i) => `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 ${(i + 1) * pageWidth} ${pageHeight}] >>`,
    ),
  ];

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(Buffer.byteLength(body, 'latin1'));
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = Buffer.byteLength(body, 'latin1');
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  body += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(body, 'latin1');
}

/**
 * Write raw bytes over TLS and collect whatever comes back before the server
 * closes the connection. With `halfClose`, the write side is ended after the
 * bytes, which the server sees as end of stream.
 */
export function sendRaw(port: number, ca: string, bytes: Buffer, halfClose = false): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = connect({ host: '127.0.0.1', port, ca, checkServerIdentity: () => undefined }, () => {
      if (halfClose) {
        socket.end(bytes);
      } else {
        socket.write(bytes);
      }
    });
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('close', () => resolve(Buffer.concat(chunks)));
    socket.on('error', (err: NodeJS.ErrnoException) => {
      // The server resets connections it abandons.
      if (err.code === 'ECONNRESET' || err.code === 'EPIPE') return;
      reject(err);
    });
  });
}
