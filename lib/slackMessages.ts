import { differenceInHours } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import type { OrderRecord } from './shopifyOrders.js';

export const REPORT_HEADER = '*Unfulfilled orders > 24hrs (within last 30 days) — Please Review*';
export const NO_ORDERS_MESSAGE = ':white_check_mark: No unfulfilled orders in the 30d→24h window.';

export type MessageBlock = {
  header: string | null;
  body: string;
};

export type FormatOptions = {
  timeZone: string;
  now: Date;
};

export type BuildMessageOptions = FormatOptions & {
  maxLength: number;
};

export function formatOrderLine(order: OrderRecord, options: FormatOptions): string {
  const createdAt = new Date(order.createdAt);
  const when = formatInTimeZone(createdAt, options.timeZone, 'MMM dd, yyyy hh:mm a zzz');
  const age = formatAge(differenceInHours(options.now, createdAt));
  const financial = order.financialStatus ?? 'UNKNOWN';

  return [
    `• <${order.adminUrl}|${escapeMrkdwn(order.name)}>`,
    `${when} (${age} old)`,
    formatMoney(order.totalAmount, order.currencyCode),
    `Financial: \`${financial}\``,
    `Fulfillment: \`${order.fulfillmentStatus}\``,
  ].join(' — ');
}

/**
 * Greedily pack lines into newline-joined chunks of at most `maxLength` characters.
 * A line that alone exceeds the limit is emitted as its own chunk, untruncated.
 */
export function chunkLines(lines: readonly string[], maxLength: number): string[] {
  const chunks: string[] = [];
  let current: string | null = null;

  for (const line of lines) {
    if (current !== null && current.length + 1 + line.length <= maxLength) {
      current = `${current}\n${line}`;
      continue;
    }
    if (current !== null) {
      chunks.push(current);
    }
    current = line;
  }

  if (current !== null) {
    chunks.push(current);
  }
  return chunks;
}

export function buildMessageBlocks(
  orders: readonly OrderRecord[],
  options: BuildMessageOptions,
): MessageBlock[] {
  if (!orders.length) {
    return [{ header: null, body: NO_ORDERS_MESSAGE }];
  }

  const lines = orders.map((order) => formatOrderLine(order, options));
  return chunkLines(lines, options.maxLength).map((body, index) => ({
    header: index === 0 ? REPORT_HEADER : `${REPORT_HEADER} (cont. ${index})`,
    body,
  }));
}

function formatAge(hours: number): string {
  return hours >= 24 ? `${Math.floor(hours / 24)}d` : `${Math.max(hours, 0)}h`;
}

function formatMoney(amount: string, currency: string): string {
  const value = Number.parseFloat(amount);
  const safeAmount = Number.isFinite(value) ? value : 0;
  return `${currency} ${safeAmount.toFixed(2)}`;
}

// Slack treats these as control characters inside mrkdwn links.
function escapeMrkdwn(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
