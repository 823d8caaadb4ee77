import { LogLevel } from '../utils';

/**
 * FTX API credentials
 * A subaccount name selects an exchange-side sub-ledger for every signed request
 */
export interface FtxCredentials {
  apiKey: string;
  secret: string;
  subaccountName?: string;
}

/**
 * Client configuration, captured once at construction
 */
export interface FtxClientConfig {
  endpoint?: string;
  apiKey: string;
  apiSecret: string;
  subaccountName?: string;
  // Level for the client's loggers; LOG_LEVEL when omitted
  logLevel?: LogLevel;
}
