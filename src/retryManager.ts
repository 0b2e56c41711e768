// src/retryManager.ts
import { StructuredLogger } from './core/StructuredLogger';
import { RunCancelledError, toError } from './core/errors';

export interface RetryConfig {
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
}

export interface RetryOptions {
  /** false = échec définitif, pas de nouvelle tentative */
  shouldRetry?: (error: Error) => boolean;
  signal?: AbortSignal;
}

export class RetryManager {
  private config: RetryConfig;

  constructor(
    private readonly logger: StructuredLogger,
    config?: Partial<RetryConfig>
  ) {
    this.config = {
      maxAttempts: 3,
      baseDelay: 1000,
      maxDelay: 30000,
      backoffMultiplier: 2,
      ...config
    };
  }

  getConfig(): RetryConfig {
    return { ...this.config };
  }

  async executeWithRetry<T>(
    operation: () => Promise<T>,
    operationName: string,
    options: RetryOptions = {}
  ): Promise<T> {
    const { shouldRetry = () => true, signal } = options;
    let lastError: Error = new Error(`${operationName}: no attempt made`);

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw new RunCancelledError(`${operationName} cancelled`);
      }

      try {
        return await operation();
      } catch (error) {
        lastError = toError(error);

        if (lastError instanceof RunCancelledError || signal?.aborted) {
          throw lastError;
        }

        if (!shouldRetry(lastError)) {
          this.logger.debug(`❌ ${operationName} - échec non récupérable`, { attempt, reason: lastError.message });
          throw lastError;
        }

        if (attempt === this.config.maxAttempts) {
          this.logger.debug(`❌ Échec ${operationName}: ${lastError.message} (${attempt} tentatives)`);
          throw lastError;
        }

        const delay = this.calculateDelay(attempt);
        this.logger.debug(`⏳ ${operationName} - tentative ${attempt}/${this.config.maxAttempts} échouée, nouvel essai dans ${delay}ms`, {
          reason: lastError.message
        });
        await this.sleep(delay, signal);
      }
    }

    throw lastError;
  }

  // Backoff exponentiel plafonné
  calculateDelay(attempt: number): number {
    return Math.min(
      this.config.baseDelay * Math.pow(this.config.backoffMultiplier, attempt - 1),
      this.config.maxDelay
    );
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (ms <= 0) {
        resolve();
        return;
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
