import type { NotifierConfig } from './config.js';
import { postMessageBlocks, type PostOptions } from './slack.js';
import { buildMessageBlocks, type MessageBlock } from './slackMessages.js';
import {
  fetchUnfulfilledOrders,
  resolveOrderWindow,
  type FetchOrdersOptions,
  type OrderWindow,
} from './shopifyOrders.js';

export type ReportOptions = FetchOrdersOptions &
  PostOptions & {
    dryRun?: boolean;
    now?: Date;
  };

export type ReportResult = {
  dryRun: boolean;
  window: OrderWindow;
  totalOrders: number;
  messages: number;
  postedMessages: number;
  failedMessages: number;
  preview?: MessageBlock[];
};

export async function runUnfulfilledOrdersReport(
  config: NotifierConfig,
  options: ReportOptions = {},
): Promise<ReportResult> {
  const now = options.now ?? new Date();
  const window = resolveOrderWindow(now);
  console.log(`📅 Order window: ${window.createdAtMin} → ${window.createdAtMax}`);

  const orders = await fetchUnfulfilledOrders(config, window, options);
  console.log(`📦 Unfulfilled orders found: ${orders.length}`);

  const blocks = buildMessageBlocks(orders, {
    maxLength: config.maxSectionChars,
    timeZone: config.timeZone,
    now,
  });

  if (options.dryRun) {
    console.log(`🧪 Dry run enabled. Skipping ${blocks.length} Slack message(s).`);
    return {
      dryRun: true,
      window,
      totalOrders: orders.length,
      messages: blocks.length,
      postedMessages: 0,
      failedMessages: 0,
      preview: blocks,
    };
  }

  const summary = await postMessageBlocks(config, blocks, options);

  console.log(`\n📊 Report Summary:`);
  console.log(`   📦 Orders: ${orders.length}`);
  console.log(`   ✅ Posted: ${summary.posted}/${blocks.length} Slack message(s)`);
  if (summary.failed) {
    console.warn(`   ❌ Failed: ${summary.failed}`);
  }

  return {
    dryRun: false,
    window,
    totalOrders: orders.length,
    messages: blocks.length,
    postedMessages: summary.posted,
    failedMessages: summary.failed,
  };
}
