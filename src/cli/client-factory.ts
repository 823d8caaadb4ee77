import { loadEnvironment } from '../config/environment';
import { FtxClient } from '../exchanges/ftx/ftx-client';

/**
 * Client Factory
 * Builds one FtxClient from the environment and reuses it for the rest of the process
 */
export class ClientFactory {
  private static client?: FtxClient;

  static getClient(): FtxClient {
    if (!this.client) {
      const config = loadEnvironment();
      this.client = new FtxClient({ ...config.ftx, logLevel: config.logLevel });
    }
    return this.client;
  }

  static reset(): void {
    this.client = undefined;
  }
}
