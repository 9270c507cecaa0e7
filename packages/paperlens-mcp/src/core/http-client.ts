import { setTimeout as sleep } from 'node:timers/promises';
import { HttpRequestError } from './errors.js';
import type { Logger } from './logger.js';
import { describeError } from './logger.js';

export interface HttpClientOptions {
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  userAgent?: string;
}

interface PostOptions {
  url: URL;
  body: FormData;
  accept?: string;
}

// 4xx responses other than 408/429 will not improve on retry.
const isRetryable = (error: unknown): boolean => {
  if (!(error instanceof HttpRequestError) || error.status === undefined) {
    return true;
  }

  return error.status >= 500 || error.status === 408 || error.status === 429;
};

export class HttpClient {
  constructor(
    private readonly options: HttpClientOptions,
    private readonly logger: Logger
  ) {}

  async postForText({ url, body, accept }: PostOptions): Promise<string> {
    let attempt = 0;
    let lastError: unknown;

    while (attempt <= this.options.retryAttempts) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

      try {
        const response = await fetch(url, {
          method: 'POST',
          body,
          headers: {
            accept: accept ?? '*/*',
            'user-agent': this.options.userAgent ?? 'paperlens-mcp/1.0'
          },
          signal: controller.signal
        });

        if (!response.ok) {
          const text = await response.text();
          throw new HttpRequestError(`POST ${url.pathname} returned HTTP ${response.status}`, url.toString(), response.status, {
            body: text.slice(0, 1000)
          });
        }

        return await response.text();
      } catch (error) {
        lastError = error;
        const isLastAttempt = attempt >= this.options.retryAttempts;
        if (isLastAttempt || !isRetryable(error)) {
          break;
        }

        this.logger.debug('HTTP request failed, retrying', {
          url: url.toString(),
          attempt: attempt + 1,
          error: describeError(error)
        });
        await sleep(this.options.retryDelayMs);
      } finally {
        clearTimeout(timeoutId);
      }

      attempt += 1;
    }

    if (lastError instanceof HttpRequestError) {
      throw lastError;
    }

    throw new HttpRequestError(`POST ${url.pathname} failed: ${describeError(lastError)}`, url.toString());
  }
}
