import { RETRY_CONFIG } from '../../constants.js'
import { isExportError } from '../../errors/index.js'
import type { Logger } from '../../utils/logger.js'
import { sharedLogger } from '../../utils/shared-logger.js'

export interface RetryConfig {
  readonly maxRetries: number
  readonly baseDelayMs: number
  readonly maxDelayMs: number
  readonly retryableStatuses: readonly number[]
}

export interface RetryService {
  execute<T>(fn: () => Promise<T>, context: string): Promise<T>
}

export class ExponentialBackoffRetryService implements RetryService {
  private readonly config: RetryConfig

  constructor(
    config: Partial<RetryConfig> = {},
    private readonly logger: Logger = sharedLogger
  ) {
    this.config = { ...RETRY_CONFIG, ...config }
  }

  async execute<T>(fn: () => Promise<T>, context: string): Promise<T> {
    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await fn()
      } catch (error) {
        if (attempt === this.config.maxRetries) {
          throw error
        }

        if (!this.isRetryable(error)) {
          throw error
        }

        const delay = this.calculateDelay(attempt)

        this.logger.warn('Retrying request', {
          context,
          attempt: attempt + 1,
          maxRetries: this.config.maxRetries,
          delayMs: Math.round(delay)
        })

        await this.sleep(delay)
      }
    }

    throw new Error(`Retry failed for ${context}`)
  }

  /**
   * Wrap a request that resolves with a status code; retryable statuses are
   * retried like thrown errors, the last response is returned as-is.
   */
  async executeForStatus<T extends { status: number }>(
    fn: () => Promise<T>,
    context: string
  ): Promise<T> {
    let last: T | undefined
    try {
      return await this.execute(async () => {
        last = await fn()
        if (this.config.retryableStatuses.includes(last.status)) {
          throw new RetryableStatus(last.status)
        }
        return last
      }, context)
    } catch (error) {
      if (error instanceof RetryableStatus && last !== undefined) {
        return last
      }
      throw error
    }
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof RetryableStatus) {
      return true
    }

    if (isExportError(error)) {
      return error.isRetryable()
    }

    return false
  }

  private calculateDelay(attempt: number): number {
    const exponential = this.config.baseDelayMs * 2 ** attempt
    const jitter = Math.random() * 0.3 * exponential
    const delay = exponential + jitter
    return Math.min(delay, this.config.maxDelayMs)
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
  }
}

class RetryableStatus extends Error {
  constructor(public readonly status: number) {
    super(`Retryable status ${status}`)
  }
}
