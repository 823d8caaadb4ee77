import { FtxClient } from './exchanges/ftx/ftx-client';

export * from './types';

export { FtxClient };
export { FtxAuth, DEFAULT_FTX_ENDPOINT } from './exchanges/ftx/ftx-auth';
export type { ResultSchema } from './exchanges/ftx/ftx-auth';
export { FtxUtils } from './exchanges/ftx/ftx-utils';
export * from './exchanges/ftx/ftx-errors';
export * from './exchanges/ftx/ftx-schemas';

export { EnvironmentValidator, loadEnvironment } from './config/environment';
export type { EnvironmentConfig } from './config/environment';
export { Logger, createLogger } from './utils';
export type { LogLevel, LogContext } from './utils';

export default FtxClient;
