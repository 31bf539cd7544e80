/**
 * Base error for the notifier pipeline.
 * Carries a stable code so entry points can map failures to status codes.
 */
export class NotifierError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'NotifierError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Missing or invalid environment configuration. Raised before any network call.
 */
export class ConfigurationError extends NotifierError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Shopify Admin API failure: bad HTTP status, GraphQL errors, malformed payload
 * or a pagination loop that stopped making progress.
 */
export class ShopifyQueryError extends NotifierError {
  constructor(message: string, details?: unknown) {
    super(message, 'SHOPIFY_QUERY_ERROR', details);
    this.name = 'ShopifyQueryError';
  }
}

/**
 * A single chat.postMessage call that Slack rejected.
 */
export class SlackDeliveryError extends NotifierError {
  constructor(message: string, details?: unknown) {
    super(message, 'SLACK_DELIVERY_ERROR', details);
    this.name = 'SlackDeliveryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : typeof error === 'string' ? error : 'Unknown error';
}
