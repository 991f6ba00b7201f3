// Resilient Bridge Client - retry with exponential backoff and a circuit breaker
// One instance per terminal bridge. Failures leave this module already
// classified as ConnectionError, AuthError or RejectError.

import axios, { AxiosError, AxiosInstance, Method } from 'axios';
import logger from '../shared/logger';
import { AuthError, ConnectionError, CopierError, RejectError } from '../shared/errors';

export interface BridgeClientConfig {
  venue: string;
  baseURL: string;
  apiKey?: string;
  timeout: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  circuitBreakerThreshold: number;
  circuitBreakerResetMs: number;
}

interface CircuitState {
  failures: number;
  lastFailure: number;
  state: 'CLOSED' | 'OPEN' | 'HALF_OPEN';
}

const RETRYABLE_STATUSES = [408, 429, 500, 502, 503, 504];

/**
 * Map an axios failure onto the gateway error taxonomy.
 */
export function classifyBridgeError(venue: string, error: unknown): CopierError {
  if (error instanceof CopierError) return error;

  if (!axios.isAxiosError(error)) {
    return new ConnectionError(venue, error instanceof Error ? error.message : String(error));
  }

  const status = error.response?.status;
  if (status === undefined) {
    return new ConnectionError(venue, error.code ? `${error.code}: ${error.message}` : error.message);
  }
  if (status === 401 || status === 403) {
    return new AuthError(venue, `bridge refused credentials (HTTP ${status})`);
  }
  if (RETRYABLE_STATUSES.includes(status)) {
    return new ConnectionError(venue, `bridge unavailable (HTTP ${status})`);
  }

  return new RejectError(venue, bridgeReason(error) ?? `HTTP ${status}`);
}

function bridgeReason(error: AxiosError): string | undefined {
  const data: unknown = error.response?.data;
  if (typeof data === 'string' && data.length > 0) return data;
  if (data !== null && typeof data === 'object' && 'error' in data) {
    const reason = data.error;
    if (typeof reason === 'string') return reason;
  }
  return undefined;
}

export class ResilientBridgeClient {
  private client: AxiosInstance;
  private config: Required<BridgeClientConfig>;
  private circuit: CircuitState = { failures: 0, lastFailure: 0, state: 'CLOSED' };
  private requestCount = 0;
  private errorCount = 0;

  constructor(config: BridgeClientConfig, client?: AxiosInstance) {
    this.config = {
      apiKey: '',
      maxDelayMs: 30000,
      ...config,
    };

    this.client = client ?? axios.create({
      baseURL: this.config.baseURL,
      timeout: this.config.timeout,
      headers: {
        'Content-Type': 'application/json',
        ...(this.config.apiKey ? { 'X-API-Key': this.config.apiKey } : {}),
      },
    });
  }

  get<T = unknown>(url: string): Promise<T> {
    return this.requestWithRetry<T>('GET', url);
  }

  post<T = unknown>(url: string, data: unknown): Promise<T> {
    return this.requestWithRetry<T>('POST', url, data);
  }

  patch<T = unknown>(url: string, data: unknown): Promise<T> {
    return this.requestWithRetry<T>('PATCH', url, data);
  }

  delete<T = unknown>(url: string): Promise<T> {
    return this.requestWithRetry<T>('DELETE', url);
  }

  private async requestWithRetry<T>(method: Method, url: string, data?: unknown): Promise<T> {
    this.checkCircuitBreaker();

    let lastError: CopierError | null = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        this.requestCount++;
        const response = await this.client.request<T>({ method, url, data });
        this.onSuccess();
        return response.data;
      } catch (error) {
        this.errorCount++;
        lastError = classifyBridgeError(this.config.venue, error);

        // Only transport failures are worth another attempt
        if (!(lastError instanceof ConnectionError)) {
          throw lastError;
        }

        this.recordFailure();

        if (attempt === this.config.maxRetries || this.circuit.state === 'OPEN') {
          break;
        }

        const delay = this.calculateBackoff(attempt);
        logger.warn(
          `[BridgeClient:${this.config.venue}] ${method} ${url} failed ` +
          `(attempt ${attempt + 1}/${this.config.maxRetries + 1}), retrying in ${delay.toFixed(0)}ms: ${lastError.message}`
        );
        await this.sleep(delay);
      }
    }

    throw lastError ?? new ConnectionError(this.config.venue, `${method} ${url} failed`);
  }

  private onSuccess(): void {
    if (this.circuit.state !== 'CLOSED') {
      logger.info(`[BridgeClient:${this.config.venue}] Circuit breaker closed`);
    }
    this.circuit.state = 'CLOSED';
    this.circuit.failures = 0;
  }

  private recordFailure(): void {
    this.circuit.failures++;
    this.circuit.lastFailure = Date.now();

    if (this.circuit.state !== 'OPEN' && this.circuit.failures >= this.config.circuitBreakerThreshold) {
      this.circuit.state = 'OPEN';
      logger.error(`[BridgeClient:${this.config.venue}] Circuit breaker opened after ${this.circuit.failures} failures`);
    }
  }

  private checkCircuitBreaker(): void {
    if (this.circuit.state !== 'OPEN') return;

    const sinceLastFailure = Date.now() - this.circuit.lastFailure;
    if (sinceLastFailure >= this.config.circuitBreakerResetMs) {
      this.circuit.state = 'HALF_OPEN';
      logger.info(`[BridgeClient:${this.config.venue}] Circuit breaker half-open, testing...`);
      return;
    }

    throw new ConnectionError(this.config.venue, 'circuit breaker open');
  }

  private calculateBackoff(attempt: number): number {
    const baseDelay = this.config.baseDelayMs * Math.pow(2, attempt);
    const jitter = Math.random() * 0.3 * baseDelay;
    return Math.min(baseDelay + jitter, this.config.maxDelayMs);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  getHealth(): { venue: string; circuitState: string; requestCount: number; errorCount: number } {
    return {
      venue: this.config.venue,
      circuitState: this.circuit.state,
      requestCount: this.requestCount,
      errorCount: this.errorCount,
    };
  }
}
