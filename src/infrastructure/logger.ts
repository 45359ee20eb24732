import pino from 'pino';

export const logger = pino({
  name: 'grocery-extraction',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createRequestLogger(
  requestId: string,
  orderId?: string,
  correlationId?: string,
) {
  return logger.child({
    requestId,
    ...(orderId !== undefined && { orderId }),
    ...(correlationId !== undefined && { correlationId }),
  });
}

/** Shortens a matched snippet before it is logged or attached to a violation. */
export function truncateSnippet(value: string, maxLength = 50): string {
  return value.length > maxLength ? value.slice(0, maxLength) : value;
}
