/**
 * @fileoverview OpenAI Batch API helpers: build the JSONL request file, start a
 * batch job, poll it until it finishes and read the answers back.
 */

import OpenAI, { toFile } from 'openai';
import { FormatError, ProviderError } from '../core/errors.js';
import { sleep } from '../core/translator.js';

export type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;

const CHAT_COMPLETIONS_ENDPOINT = '/v1/chat/completions';
const FAILED_STATUSES = new Set(['failed', 'expired', 'cancelled']);

export function customId(index: number): string {
  return `item-${index + 1}`;
}

/**
 * Serialize one chat request per conversation as JSONL. Request `i` gets the
 * custom id `item-{i + 1}`.
 */
export function createBatchFile(conversations: ChatMessage[][], model: string): string {
  return conversations
    .map((messages, index) =>
      JSON.stringify({
        custom_id: customId(index),
        method: 'POST',
        url: CHAT_COMPLETIONS_ENDPOINT,
        body: { model, messages, response_format: { type: 'json_object' } },
      })
    )
    .join('\n') + '\n';
}

/**
 * Upload the request file and start a batch job.
 *
 * @returns The id of the created job
 */
export async function createBatchJob(client: OpenAI, model: string, jsonl: string): Promise<string> {
  const file = await client.files.create({
    file: await toFile(Buffer.from(jsonl, 'utf8'), 'translate-batch.jsonl'),
    purpose: 'batch',
  });

  const job = await client.batches.create({
    input_file_id: file.id,
    endpoint: CHAT_COMPLETIONS_ENDPOINT,
    completion_window: '24h',
    metadata: { model, purpose: 'translate' },
  });
  return job.id;
}

/**
 * Poll a batch job every `interval` ms until it completes.
 *
 * @returns Contents of the job's output file
 * @throws ProviderError if the job fails, expires or is cancelled
 */
export async function waitForBatchContent(
  client: OpenAI,
  jobId: string,
  interval: number,
  onStatus?: (status: string) => void
): Promise<string> {
  for (;;) {
    const job = await client.batches.retrieve(jobId);
    onStatus?.(job.status);

    if (job.status === 'completed') {
      if (!job.output_file_id) {
        throw new ProviderError(`Batch job ${jobId} completed without an output file`);
      }
      const content = await client.files.content(job.output_file_id);
      return content.text();
    }

    if (FAILED_STATUSES.has(job.status)) {
      const reason = job.errors?.data?.[0]?.message ?? job.status;
      throw new ProviderError(`Batch job ${jobId} ${job.status}: ${reason}`);
    }

    await sleep(interval);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function messageContent(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) {
    return null;
  }
  const [choice] = body.choices;
  if (!isRecord(choice) || !isRecord(choice.message)) {
    return null;
  }
  return typeof choice.message.content === 'string' ? choice.message.content : null;
}

/**
 * Parse the output file of a batch job.
 *
 * @returns Assistant message content by custom id
 * @throws FormatError if a line is not JSON or has no message content
 */
export function parseBatchContent(content: string): Map<string, string> {
  const answers = new Map<string, string>();

  for (const line of content.split('\n')) {
    if (line.trim() === '') continue;

    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch (error) {
      throw new FormatError('Batch output line is not valid JSON', { cause: error });
    }

    if (!isRecord(data) || typeof data.custom_id !== 'string') {
      throw new FormatError('Batch output line has no custom_id');
    }
    const body = isRecord(data.response) ? data.response.body : undefined;
    const text = messageContent(body);
    if (text === null) {
      throw new FormatError(`Batch output for ${data.custom_id} has no message content`);
    }
    answers.set(data.custom_id, text);
  }

  return answers;
}
