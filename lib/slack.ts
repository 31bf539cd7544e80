import { z } from 'zod';
import type { NotifierConfig } from './config.js';
import { SlackDeliveryError, errorMessage } from './errors.js';
import type { MessageBlock } from './slackMessages.js';

export const SLACK_POST_MESSAGE_URL = 'https://slack.com/api/chat.postMessage';

export type PostOptions = {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

export type PostSummary = {
  posted: number;
  failed: number;
  errors: SlackDeliveryError[];
};

type SectionBlock = {
  type: 'section';
  text: { type: 'mrkdwn'; text: string };
};

const postMessageResponseSchema = z
  .object({
    ok: z.boolean(),
    error: z.string().optional(),
  })
  .passthrough();

export function toSlackBlocks(message: MessageBlock): SectionBlock[] {
  const blocks: SectionBlock[] = [];
  if (message.header) {
    blocks.push(section(message.header));
  }
  blocks.push(section(message.body));
  return blocks;
}

export async function postSlackMessage(
  config: NotifierConfig,
  message: MessageBlock,
  options: PostOptions = {},
): Promise<void> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const response = await fetchImpl(SLACK_POST_MESSAGE_URL, {
    method: 'POST',
    headers: {
      Authorization: `Bearer ${config.slackToken}`,
      'Content-Type': 'application/json; charset=utf-8',
    },
    body: JSON.stringify({
      channel: config.slackChannelId,
      text: message.header ?? message.body,
      blocks: toSlackBlocks(message),
    }),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new SlackDeliveryError(`Slack post failed (${response.status}): ${body}`, {
      status: response.status,
    });
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new SlackDeliveryError('Slack returned a non-JSON response', { cause: error });
  }

  const parsed = postMessageResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SlackDeliveryError(`Malformed Slack response: ${parsed.error.message}`);
  }
  if (!parsed.data.ok) {
    throw new SlackDeliveryError(`Slack error: ${parsed.data.error ?? 'unknown_error'}`, parsed.data);
  }
}

/**
 * Post each message in order, pausing between consecutive posts.
 * A failed post is logged and counted; the remaining messages are still sent.
 */
export async function postMessageBlocks(
  config: NotifierConfig,
  messages: readonly MessageBlock[],
  options: PostOptions = {},
): Promise<PostSummary> {
  const sleep = options.sleep ?? delay;
  const summary: PostSummary = { posted: 0, failed: 0, errors: [] };

  for (const [index, message] of messages.entries()) {
    if (index > 0) {
      await sleep(config.postDelayMs);
    }

    try {
      await postSlackMessage(config, message, options);
      summary.posted += 1;
    } catch (error) {
      const failure =
        error instanceof SlackDeliveryError
          ? error
          : new SlackDeliveryError(errorMessage(error), { cause: error });
      console.error(`❌ Slack message ${index + 1}/${messages.length} failed:`, failure.message);
      summary.failed += 1;
      summary.errors.push(failure);
    }
  }

  return summary;
}

function section(text: string): SectionBlock {
  return { type: 'section', text: { type: 'mrkdwn', text } };
}

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}
