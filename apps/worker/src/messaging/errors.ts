/**
 * Unified error code type for the messaging lifecycle
 */
export type MessagingErrorCode =
  | "LIFECYCLE_VIOLATION"
  | "PROVIDER_UNAVAILABLE"
  | "CONSUMER_BINDING_FAILED"
  | "DRAIN_FORWARDING_FAILED"
  | "MESSAGE_VALIDATION_FAILED";

/**
 * Base error class for messaging.
 *
 * Check `code` for the specific failure and `retryable` to tell transient
 * conditions from defects.
 */
export class MessagingError extends Error {
  declare readonly code: MessagingErrorCode;

  /**
   * Whether this error is transient and safe to retry
   */
  retryable: boolean;

  /**
   * Original error that caused this, if any
   */
  override cause?: unknown;

  /**
   * Message type name, if applicable
   */
  messageType?: string | undefined;

  constructor(
    message: string,
    options: {
      code: MessagingErrorCode;
      retryable?: boolean;
      cause?: unknown;
      messageType?: string;
    },
  ) {
    super(message);
    this.name = "MessagingError";
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
    this.messageType = options.messageType;
    Object.setPrototypeOf(this, MessagingError.prototype);
  }
}

/**
 * A send reached the buffer after it stopped accepting, or a phase
 * transition went backwards. Always a defect.
 */
export class LifecycleViolationError extends MessagingError {
  declare readonly code: "LIFECYCLE_VIOLATION";

  constructor(message: string, options?: { messageType?: string }) {
    super(message, { code: "LIFECYCLE_VIOLATION", ...options });
    this.name = "LifecycleViolationError";
    Object.setPrototypeOf(this, LifecycleViolationError.prototype);
  }
}

export type ProviderFailureReason = "unavailable" | "unhealthy" | "error" | "timeout";

/**
 * A provider probe, bus creation or health check did not succeed.
 * Retried locally with backoff.
 */
export class ProviderUnavailableError extends MessagingError {
  declare readonly code: "PROVIDER_UNAVAILABLE";
  readonly provider: string;
  readonly reason: ProviderFailureReason;

  constructor(
    provider: string,
    reason: ProviderFailureReason,
    options?: { cause?: unknown },
  ) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Provider "${provider}" ${reason}${detail}`, {
      code: "PROVIDER_UNAVAILABLE",
      retryable: true,
      ...options,
    });
    this.name = "ProviderUnavailableError";
    this.provider = provider;
    this.reason = reason;
    Object.setPrototypeOf(this, ProviderUnavailableError.prototype);
  }
}

/**
 * One handler could not be bound to the live bus.
 */
export class ConsumerBindingFailedError extends MessagingError {
  declare readonly code: "CONSUMER_BINDING_FAILED";

  constructor(messageType: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to bind consumer for "${messageType}": ${detail}`, {
      code: "CONSUMER_BINDING_FAILED",
      messageType,
      cause,
    });
    this.name = "ConsumerBindingFailedError";
    Object.setPrototypeOf(this, ConsumerBindingFailedError.prototype);
  }
}

/**
 * One buffered message could not be forwarded during drain.
 */
export class DrainForwardingFailedError extends MessagingError {
  declare readonly code: "DRAIN_FORWARDING_FAILED";
  readonly enqueuedAt: Date;

  constructor(messageType: string, enqueuedAt: Date, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to forward buffered "${messageType}" (enqueued ${enqueuedAt.toISOString()}): ${detail}`,
      { code: "DRAIN_FORWARDING_FAILED", messageType, cause },
    );
    this.name = "DrainForwardingFailedError";
    this.enqueuedAt = enqueuedAt;
    Object.setPrototypeOf(this, DrainForwardingFailedError.prototype);
  }
}

/**
 * A payload did not match its message type's schema.
 */
export class MessageValidationError extends MessagingError {
  declare readonly code: "MESSAGE_VALIDATION_FAILED";
  readonly issues: string[];

  constructor(messageType: string, issues: string[], cause?: unknown) {
    super(`Invalid "${messageType}" payload: ${issues.join("; ")}`, {
      code: "MESSAGE_VALIDATION_FAILED",
      messageType,
      cause,
    });
    this.name = "MessageValidationError";
    this.issues = issues;
    Object.setPrototypeOf(this, MessageValidationError.prototype);
  }
}
