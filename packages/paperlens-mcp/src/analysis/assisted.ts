import { invokeCapability, validateCompletion } from '../capabilities/invoke.js';
import type { CompletionCapability } from '../capabilities/types.js';
import { CapabilityUnavailableError, type AnalysisKind } from '../core/errors.js';
import type { Logger } from '../core/logger.js';

export interface AssistedOptions {
  timeoutMs: number;
  windowChars: number;
}

export const DEFAULT_ASSISTED_OPTIONS: AssistedOptions = {
  timeoutMs: 20000,
  windowChars: 4000
};

export const requestCompletion = async (
  completion: CompletionCapability,
  prompt: string,
  maxTokens: number,
  timeoutMs: number,
  minLength?: number
): Promise<string> => {
  const output = await invokeCapability('completion', timeoutMs, (signal) => completion.complete(prompt, maxTokens, { signal }));
  return validateCompletion(output, minLength);
};

/**
 * Runs a model-backed step and hands the capability failure to `degrade` instead of throwing.
 * Errors other than CapabilityUnavailableError still propagate.
 */
export const withDegradation = async <T>(
  kind: AnalysisKind,
  logger: Logger,
  assisted: () => Promise<T>,
  degrade: (reason: string) => T
): Promise<T> => {
  try {
    return await assisted();
  } catch (error) {
    if (!(error instanceof CapabilityUnavailableError)) {
      throw error;
    }

    logger.warn('Capability unavailable, falling back to heuristic analysis', {
      kind,
      capability: error.capability,
      error: error.message
    });
    return degrade(error.message);
  }
};
