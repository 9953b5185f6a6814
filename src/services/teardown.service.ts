import type { Logger } from "../logger.js";

/**
 * Run `body`, then `release`, whichever way `body` settles. When `body`
 * fails, a failing `release` is logged and the original error is rethrown.
 *
 * @params {() => Promise<T>} body: scoped work
 * @params {() => void | Promise<void>} release: cleanup for the scope
 * @params {Logger} logger: receives secondary release failures
 * @params {string} label: name of the released resource for the log
 * @returns {Promise<T>}
 */
export async function withRelease<T>(
  body: () => Promise<T>,
  release: () => void | Promise<void>,
  logger: Logger,
  label: string,
): Promise<T> {
  let result: T;
  try {
    result = await body();
  } catch (error) {
    try {
      await release();
    } catch (releaseError) {
      logger.warn(`failed to release ${label} after an earlier error`, releaseError);
    }
    throw error;
  }
  await release();
  return result;
}
