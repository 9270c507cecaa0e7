import { CapabilityUnavailableError, type CapabilityName } from '../core/errors.js';
import { describeError } from '../core/logger.js';

export const MIN_COMPLETION_LENGTH = 20;
export const MAX_COMPLETION_LENGTH = 20000;

/**
 * Runs one external capability call under a timeout. The call receives an AbortSignal that
 * fires when the timeout elapses; every failure leaves this function as CapabilityUnavailableError.
 */
export const invokeCapability = async <T>(
  capability: CapabilityName,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CapabilityUnavailableError(`The ${capability} capability timed out after ${timeoutMs}ms.`, capability, { timeoutMs }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), timeout]);
  } catch (error) {
    if (error instanceof CapabilityUnavailableError) {
      throw error;
    }

    throw new CapabilityUnavailableError(`The ${capability} capability failed: ${describeError(error)}`, capability, {
      cause: describeError(error)
    });
  } finally {
    clearTimeout(timer);
  }
};

export const validateCompletion = (output: string, minLength: number = MIN_COMPLETION_LENGTH): string => {
  const trimmed = output.trim();

  if (trimmed.length < minLength) {
    throw new CapabilityUnavailableError('The completion capability returned empty or truncated output.', 'completion', {
      length: trimmed.length
    });
  }

  if (trimmed.length > MAX_COMPLETION_LENGTH) {
    throw new CapabilityUnavailableError('The completion capability returned implausibly long output.', 'completion', {
      length: trimmed.length
    });
  }

  return trimmed;
};

const isFiniteVector = (vector: number[]): boolean => vector.length > 0 && vector.every((value) => Number.isFinite(value));

export const validateEmbeddings = (vectors: number[][], expectedCount: number): number[][] => {
  const dimension = vectors[0]?.length ?? 0;

  if (vectors.length !== expectedCount || !vectors.every((vector) => isFiniteVector(vector) && vector.length === dimension)) {
    throw new CapabilityUnavailableError('The embedding capability returned malformed vectors.', 'embedding', {
      expectedCount,
      receivedCount: vectors.length
    });
  }

  return vectors;
};
