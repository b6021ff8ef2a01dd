export { ConversionClient } from './conversion-client.js';
export type { ConversionClientOptions, ConvertResult, SubmitResult } from './conversion-client.js';
export { createClientFromConfig, readTrustedCertificate } from './client-factory.js';
export type { ClientConfig } from './client-factory.js';
export { createProgram, runConvert } from './convert-command.js';
export type { ConvertCommandIO } from './convert-command.js';
export { createUiServer, startUiServer, closeServer } from './http/server.js';
export type { UiServerOptions } from './http/server.js';
export { STATUS_BY_KIND } from './http/routes/index.js';
export * as clientConfig from './config.js';
