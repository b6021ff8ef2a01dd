export { ConversionServer } from './conversion-server.js';
export type { ConversionServerOptions, ConversionServerStats } from './conversion-server.js';
export { ConversionDispatcher } from './dispatcher.js';
export { ConversionLimiter } from './limiter.js';
export type { LimiterStats } from './limiter.js';
export { generateCertificate, ensureCertificates, loadCertificates } from './certs.js';
export type { CertificatePair, GenerateCertificateOptions } from './certs.js';
export { startConversionServer, installShutdownHandlers } from './lifecycle.js';
export type { StartOptions } from './lifecycle.js';
export * from './providers/index.js';
export * as serverConfig from './config.js';
