import { MessageValidationError } from "./errors.js";
import type { MessageBus, MessageType } from "./types.js";

/**
 * Hand one message to a live bus, honouring queue routing when the bus supports it.
 */
export async function dispatchToBus<T>(
  bus: MessageBus,
  messageType: MessageType<T>,
  payload: T,
  queue?: string
): Promise<void> {
  if (queue !== undefined && bus.sendToQueue) {
    return bus.sendToQueue(queue, messageType, payload);
  }
  return bus.sendMessage(messageType, payload);
}

/**
 * Parse a payload with its type's schema. Returns the parsed value, so schema
 * defaults and transforms apply before the message is buffered or sent.
 */
export function parsePayload<T>(messageType: MessageType<T>, payload: unknown): T {
  const result = messageType.schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new MessageValidationError(messageType.name, issues, result.error);
  }
  return result.data;
}
