import crypto from 'crypto';
import { z } from 'zod';
import { FtxCredentials, HttpMethod, QueryParams, RequestOptions } from '../../types';
import { LogLevel, Logger, createLogger } from '../../utils';
import { FtxApiError, FtxResponseError, FtxTransportError } from './ftx-errors';
import { ftxEnvelopeSchema } from './ftx-schemas';
import { FtxUtils } from './ftx-utils';

export const DEFAULT_FTX_ENDPOINT = 'https://ftx.com/api/';

export type ResultSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * FTX Authentication and Request Handler
 *
 * Signs requests with HMAC-SHA256 over timestamp + method + path[?query] + body,
 * sends them and unwraps the {success, result | error} envelope.
 */
export class FtxAuth {
  private readonly credentials: Readonly<FtxCredentials>;
  private readonly endpoint: string;
  private readonly logger: Logger;

  /**
   * @param credentials - validated here; construction fails on an empty or non-string key or secret
   * @param endpoint - base URL every request path is appended to
   * @param logLevel - level for this handler's logger, LOG_LEVEL when omitted
   */
  constructor(
    credentials: FtxCredentials,
    endpoint: string = DEFAULT_FTX_ENDPOINT,
    logLevel?: LogLevel
  ) {
    FtxUtils.validateCredentials(credentials.apiKey, credentials.secret);
    this.logger = createLogger('ftx-auth', undefined, logLevel);
    this.credentials = Object.freeze({ ...credentials });
    this.endpoint = endpoint.endsWith('/') ? endpoint : `${endpoint}/`;
  }

  get baseUrl(): string {
    return this.endpoint;
  }

  /**
   * Hex HMAC-SHA256 of `${timestamp}${METHOD}${pathUrl}${body}`
   *
   * @param pathUrl - path and query string of the final URL, without scheme or host
   * @param body - serialized request body, empty when there is none
   */
  generateSignature(timestamp: number, method: string, pathUrl: string, body: string = ''): string {
    const payload = `${timestamp}${method.toUpperCase()}${pathUrl}${body}`;
    return crypto.createHmac('sha256', this.credentials.secret).update(payload).digest('hex');
  }

  /**
   * Get required headers for a signed FTX request
   */
  getHeaders(
    method: string,
    pathUrl: string,
    body: string = '',
    timestamp: number = Date.now()
  ): Record<string, string> {
    const headers: Record<string, string> = {
      'FTX-KEY': this.credentials.apiKey,
      'FTX-SIGN': this.generateSignature(timestamp, method, pathUrl, body),
      'FTX-TS': timestamp.toString(),
    };

    if (body) {
      headers['Content-Type'] = 'application/json';
    }

    if (this.credentials.subaccountName) {
      headers['FTX-SUBACCOUNT'] = FtxUtils.encodeSubaccount(this.credentials.subaccountName);
    }

    return headers;
  }

  /**
   * Full request URL: endpoint + path + encoded query
   */
  resolveUrl(path: string, params?: QueryParams): URL {
    const relativePath = path.replace(/^\/+/, '');
    const queryString = FtxUtils.buildQueryString(params);

    return new URL(
      queryString
        ? `${this.endpoint}${relativePath}?${queryString}`
        : `${this.endpoint}${relativePath}`
    );
  }

  /**
   * Make signed request to FTX API
   *
   * The signature covers the resolved path and query and the serialized body,
   * which are exactly what is sent.
   *
   * @param schema - shape of the envelope's `result`; pass `z.unknown()` to take it verbatim
   */
  async makeRequest<T>(
    schema: ResultSchema<T>,
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = this.resolveUrl(path, options.params);
    const pathUrl = `${url.pathname}${url.search}`;
    const body = options.body !== undefined ? JSON.stringify(options.body) : undefined;

    const headers = this.getHeaders(method, pathUrl, body, Date.now());

    this.logger.debug('Sending FTX request', { method, path: pathUrl });

    let response: Response;
    try {
      response = await fetch(url.toString(), { method, headers, body });
    } catch (error) {
      this.logger.error('Request failed', {
        method,
        path: pathUrl,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    return this.handleResponse(response, schema, pathUrl);
  }

  /**
   * Unwrap the response envelope
   */
  private async handleResponse<T>(
    response: Response,
    schema: ResultSchema<T>,
    endpoint: string
  ): Promise<T> {
    const responseText = await response.text();

    let data: unknown;
    try {
      data = JSON.parse(responseText);
    } catch {
      const errorMessage = response.ok
        ? `Invalid JSON response from FTX API: ${responseText.substring(0, 200)}`
        : `HTTP ${response.status}: ${response.statusText}`;

      this.logger.error('FTX API request failed', {
        endpoint,
        status: response.status,
        error: errorMessage,
      });

      throw new FtxTransportError(errorMessage, response.status);
    }

    const envelope = ftxEnvelopeSchema.safeParse(data);
    if (!envelope.success) {
      this.logger.error('FTX API response is not an envelope', {
        endpoint,
        status: response.status,
        responseText: responseText.substring(0, 200),
      });
      throw new FtxResponseError(`Unexpected response from FTX API for ${endpoint}`, endpoint);
    }

    if (!envelope.data.success) {
      const errorMessage = envelope.data.error ?? 'Unknown error';
      this.logger.error('FTX API returned error', {
        endpoint,
        status: response.status,
        error: errorMessage,
      });
      throw new FtxApiError(errorMessage, response.status, endpoint);
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.') || 'result'}: ${issue.message}`)
        .join('; ');
      this.logger.error('FTX API result has unexpected shape', { endpoint, issues });
      throw new FtxResponseError(`Unexpected result from FTX API for ${endpoint}: ${issues}`, endpoint);
    }

    return result.data;
  }
}
