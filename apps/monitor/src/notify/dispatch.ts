import { NotificationError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Message, Notifier } from "./types.js";

export interface DispatchOptions {
  recipients: string[];
  timeoutMs: number;
  log: Logger;
}

/**
 * Hands one message to the notifier, bounded by `timeoutMs`.
 * Failures are logged and reported as `false`; nothing is retried or thrown.
 */
export async function dispatch(
  notifier: Notifier,
  message: Message,
  { recipients, timeoutMs, log }: DispatchOptions
): Promise<boolean> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timedOut = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new NotificationError(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    const result = await Promise.race([
      notifier.send({
        subject: message.subject,
        body: message.body,
        recipients,
        signal: controller.signal,
      }),
      timedOut,
    ]);

    if (!result.ok) {
      throw new NotificationError(result.error ?? "delivery failed", result.status);
    }

    log.info(`${message.kind} sent via ${notifier.name}: ${message.subject}`);
    return true;
  } catch (err) {
    log.error(`${message.kind} not delivered (${message.subject})`, err);
    return false;
  } finally {
    clearTimeout(timer);
  }
}
