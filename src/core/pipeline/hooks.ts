import { Logger } from '@nestjs/common';

/**
 * Run a lifecycle hook. Hook failures are logged and never affect processing.
 */
export async function invokeHook<TArgs extends unknown[]>(
  logger: Logger,
  name: string,
  hook: ((...args: TArgs) => void | Promise<void>) | undefined,
  ...args: TArgs
): Promise<void> {
  if (!hook) {
    return;
  }

  try {
    await hook(...args);
  } catch (error) {
    logger.warn(
      `Lifecycle hook ${name} failed: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}
