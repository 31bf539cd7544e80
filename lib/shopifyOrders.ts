import { subHours } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { z } from 'zod';
import type { NotifierConfig } from './config.js';
import { ShopifyQueryError } from './errors.js';

export const WINDOW_MAX_AGE_DAYS = 30;
export const WINDOW_MIN_AGE_HOURS = 24;
export const ORDERS_PAGE_SIZE = 100;
export const DEFAULT_MAX_PAGES = 100;

export type OrderRecord = Readonly<{
  id: string;
  legacyId: string;
  name: string;
  createdAt: string;
  financialStatus: string | null;
  fulfillmentStatus: string;
  totalAmount: string;
  currencyCode: string;
  adminUrl: string;
}>;

export type QueryPage = {
  orders: OrderRecord[];
  hasNextPage: boolean;
  endCursor: string | null;
};

export type OrderWindow = {
  createdAtMin: string;
  createdAtMax: string;
};

export type FetchOrdersOptions = {
  fetchImpl?: typeof fetch;
  maxPages?: number;
  pageSize?: number;
};

const UNFULFILLED_ORDERS_QUERY = `
query UnfulfilledWindow($q: String!, $first: Int!, $after: String) {
  orders(first: $first, after: $after, query: $q, sortKey: CREATED_AT, reverse: true) {
    pageInfo { hasNextPage endCursor }
    edges {
      node {
        id
        legacyResourceId
        name
        createdAt
        displayFulfillmentStatus
        displayFinancialStatus
        totalPriceSet { shopMoney { amount currencyCode } }
      }
    }
  }
}
`;

const orderNodeSchema = z.object({
  id: z.string(),
  legacyResourceId: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  createdAt: z.string().datetime({ offset: true }),
  displayFulfillmentStatus: z.string(),
  displayFinancialStatus: z.string().nullable(),
  totalPriceSet: z.object({
    shopMoney: z.object({
      amount: z.string(),
      currencyCode: z.string(),
    }),
  }),
});

const ordersResponseSchema = z.object({
  data: z
    .object({
      orders: z.object({
        pageInfo: z.object({
          hasNextPage: z.boolean(),
          endCursor: z.string().nullable(),
        }),
        edges: z.array(z.object({ node: orderNodeSchema })),
      }),
    })
    .nullish(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
});

type OrderNode = z.infer<typeof orderNodeSchema>;

export function resolveOrderWindow(now: Date = new Date()): OrderWindow {
  return {
    createdAtMin: toSearchTimestamp(subHours(now, WINDOW_MAX_AGE_DAYS * 24)),
    createdAtMax: toSearchTimestamp(subHours(now, WINDOW_MIN_AGE_HOURS)),
  };
}

export function buildOrderSearchQuery(window: OrderWindow): string {
  return [
    'fulfillment_status:unfulfilled',
    'status:open',
    '-financial_status:pending',
    `created_at:>=${window.createdAtMin}`,
    `created_at:<${window.createdAtMax}`,
  ].join(' AND ');
}

export function orderAdminUrl(config: NotifierConfig, legacyId: string): string {
  if (config.adminStoreHandle) {
    return `https://admin.shopify.com/store/${config.adminStoreHandle}/orders/${legacyId}`;
  }
  return `https://${config.storeDomain}/admin/orders/${legacyId}`;
}

/**
 * Fetch a single page of unfulfilled orders from the Admin GraphQL API.
 */
export async function fetchOrdersPage(
  config: NotifierConfig,
  search: string,
  after: string | null,
  options: FetchOrdersOptions = {},
): Promise<QueryPage> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = `https://${config.storeDomain}/admin/api/${config.shopifyApiVersion}/graphql.json`;

  const response = await fetchImpl(url, {
    method: 'POST',
    headers: {
      'X-Shopify-Access-Token': config.shopifyToken,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      query: UNFULFILLED_ORDERS_QUERY,
      variables: { q: search, first: options.pageSize ?? ORDERS_PAGE_SIZE, after },
    }),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new ShopifyQueryError(`Shopify fetch failed (${response.status}): ${body}`, {
      status: response.status,
    });
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new ShopifyQueryError('Shopify returned a non-JSON response', { cause: error });
  }

  const parsed = ordersResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ShopifyQueryError(`Malformed Shopify response: ${parsed.error.message}`);
  }

  const { data, errors } = parsed.data;
  if (errors?.length) {
    throw new ShopifyQueryError(
      `Shopify GraphQL errors: ${errors.map((entry) => entry.message).join('; ')}`,
      { errors },
    );
  }
  if (!data) {
    throw new ShopifyQueryError('Malformed Shopify response: missing data');
  }

  const { pageInfo, edges } = data.orders;
  return {
    orders: edges.map((edge) => toOrderRecord(config, edge.node)),
    hasNextPage: pageInfo.hasNextPage,
    endCursor: pageInfo.endCursor,
  };
}

/**
 * Walk every page of the window's unfulfilled orders, newest first.
 * Stops with an error if the cursor stops advancing or the page cap is reached.
 */
export async function fetchUnfulfilledOrders(
  config: NotifierConfig,
  window: OrderWindow,
  options: FetchOrdersOptions = {},
): Promise<OrderRecord[]> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const search = buildOrderSearchQuery(window);
  const orders: OrderRecord[] = [];
  let after: string | null = null;

  for (let pageCount = 1; ; pageCount += 1) {
    console.log(`⬇️  Fetching Shopify orders page ${pageCount}: ${orders.length} collected so far`);
    const page = await fetchOrdersPage(config, search, after, options);
    orders.push(...page.orders);

    if (!page.hasNextPage) {
      return orders;
    }
    if (!page.endCursor || page.endCursor === after) {
      throw new ShopifyQueryError(
        `Shopify pagination did not advance after page ${pageCount} (cursor: ${page.endCursor ?? 'none'})`,
      );
    }
    if (pageCount >= maxPages) {
      throw new ShopifyQueryError(
        `Shopify still reports more orders after ${maxPages} pages; refusing to continue`,
        { collected: orders.length },
      );
    }
    after = page.endCursor;
  }
}

function toOrderRecord(config: NotifierConfig, node: OrderNode): OrderRecord {
  return {
    id: node.id,
    legacyId: node.legacyResourceId,
    name: node.name,
    createdAt: node.createdAt,
    financialStatus: node.displayFinancialStatus,
    fulfillmentStatus: node.displayFulfillmentStatus,
    totalAmount: node.totalPriceSet.shopMoney.amount,
    currencyCode: node.totalPriceSet.shopMoney.currencyCode,
    adminUrl: orderAdminUrl(config, node.legacyResourceId),
  };
}

function toSearchTimestamp(date: Date): string {
  return formatInTimeZone(date, 'UTC', "yyyy-MM-dd'T'HH:mm:ss'Z'");
}
