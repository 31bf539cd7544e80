import type { NotifierConfig } from '../lib/config.js';
import type { OrderRecord } from '../lib/shopifyOrders.js';

export function makeConfig(overrides: Partial<NotifierConfig> = {}): NotifierConfig {
  return {
    storeDomain: 'test-shop.myshopify.com',
    shopifyToken: 'test-shopify-token',
    shopifyApiVersion: '2025-10',
    adminStoreHandle: undefined,
    slackToken: 'test-slack-token',
    slackChannelId: 'C-TEST',
    timeZone: 'UTC',
    postDelayMs: 600,
    maxSectionChars: 2900,
    ...overrides,
  };
}

export function makeOrder(overrides: Partial<OrderRecord> = {}): OrderRecord {
  return {
    id: 'gid://shopify/Order/1001',
    legacyId: '1001',
    name: '#1001',
    createdAt: '2026-10-10T15:30:00Z',
    financialStatus: 'PAID',
    fulfillmentStatus: 'UNFULFILLED',
    totalAmount: '129.5',
    currencyCode: 'USD',
    adminUrl: 'https://test-shop.myshopify.com/admin/orders/1001',
    ...overrides,
  };
}

export function orderNode(legacyId: number, overrides: Record<string, unknown> = {}) {
  return {
    id: `gid://shopify/Order/${legacyId}`,
    legacyResourceId: String(legacyId),
    name: `#${legacyId}`,
    createdAt: '2026-10-10T15:30:00Z',
    displayFulfillmentStatus: 'UNFULFILLED',
    displayFinancialStatus: 'PAID',
    totalPriceSet: { shopMoney: { amount: '10.0', currencyCode: 'USD' } },
    ...overrides,
  };
}

export function ordersPage(nodes: unknown[], hasNextPage: boolean, endCursor: string | null) {
  return {
    data: {
      orders: {
        pageInfo: { hasNextPage, endCursor },
        edges: nodes.map((node) => ({ node })),
      },
    },
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function requestBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}
