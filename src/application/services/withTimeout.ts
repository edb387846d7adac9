import { UpstreamError, type UpstreamStage } from '../../domain/errors/AppError.js';

/**
 * Races a collaborator call against a timer. Anything the call rejects with
 * that is not already an UpstreamError is wrapped as one for the given stage.
 */
export const withTimeout = async <T>(stage: UpstreamStage, timeoutMs: number, call: () => Promise<T>): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new UpstreamError(stage, `${stage} service timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(), timeout]);
  } catch (error) {
    if (error instanceof UpstreamError) {
      throw error;
    }

    const reason = error instanceof Error ? error.message : String(error);
    throw new UpstreamError(stage, `${stage} service failed: ${reason}`, { cause: error });
  } finally {
    clearTimeout(timer);
  }
};
